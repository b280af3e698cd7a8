/**
 * Error taxonomy for invalid engine input.
 *
 * Everything here is raised before any computation starts. "Nothing to
 * do" conditions are not errors; they come back as a `notice` on the
 * result instead.
 */

export type PlacegridErrorCode =
  | "INVALID_GEOMETRY"
  | "INVALID_PARAMETER"
  | "INVALID_COORDINATE"
  | "INVALID_INDICATOR"
  | "GRID_TOO_LARGE";

export class PlacegridError extends Error {
  /** HTTP status used when the error reaches the service boundary */
  readonly status: number = 422;

  constructor(
    readonly code: PlacegridErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "PlacegridError";
  }
}

/** Polygon with fewer than 3 vertices or an unusable vertex */
export class InvalidGeometryError extends PlacegridError {
  constructor(message: string) {
    super("INVALID_GEOMETRY", message);
    this.name = "InvalidGeometryError";
  }
}

/** Radius, spacing factor or stop count outside its domain */
export class InvalidParameterError extends PlacegridError {
  constructor(message: string) {
    super("INVALID_PARAMETER", message);
    this.name = "InvalidParameterError";
  }
}

/** Non-finite or out-of-range latitude/longitude */
export class InvalidCoordinateError extends PlacegridError {
  constructor(message: string) {
    super("INVALID_COORDINATE", message);
    this.name = "InvalidCoordinateError";
  }
}

/** Candidate indicator that is not a finite positive number */
export class InvalidIndicatorError extends PlacegridError {
  constructor(message: string) {
    super("INVALID_INDICATOR", message);
    this.name = "InvalidIndicatorError";
  }
}

/** Sweep would visit more grid cells than the caller allows */
export class GridTooLargeError extends PlacegridError {
  constructor(message: string) {
    super("GRID_TOO_LARGE", message);
    this.name = "GridTooLargeError";
  }
}
