import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { PlacegridError } from "@placegrid/engine";

function statusOf(err: Error): number {
  if ("status" in err && typeof err.status === "number") return err.status;
  return 500;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (err instanceof ZodError) {
    const details = err.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    console.warn(`[validation] ${JSON.stringify(details)}`);
    res.status(422).json({
      message: "Validation failed",
      details,
    });
    return;
  }

  if (err instanceof PlacegridError) {
    console.warn(`[${err.code}] ${err.message}`);
    res.status(err.status).json({ message: err.message, code: err.code });
    return;
  }

  if (err instanceof Error) {
    console.error(`[error] ${err.message}`);
    res.status(statusOf(err)).json({ message: err.message });
    return;
  }

  next(err);
}
