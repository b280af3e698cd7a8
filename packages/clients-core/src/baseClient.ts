import axios, { type AxiosRequestConfig, type ResponseType } from "axios";
import type { ErrorResponse } from "./types.js";

export interface ClientConfig {
  /** Base URL for the API server (e.g., "http://localhost:3000") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Optional auth token for authenticated requests */
  token?: string;
}

export interface RequestParams {
  path?: string;
  body?: unknown;
  query?: Record<string, unknown>;
  /** Expected response body type (default: json) */
  responseType?: ResponseType;
}

/** Non-2xx response from the server, carrying its error body */
export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly code?: string,
    readonly details?: ErrorResponse["details"],
  ) {
    super(message);
    this.name = "ApiError";
  }
}

function isErrorResponse(data: unknown): data is ErrorResponse {
  return (
    typeof data === "object" &&
    data !== null &&
    "message" in data &&
    typeof data.message === "string"
  );
}

/** Turn an axios HTTP error into an ApiError; anything else is rethrown as is. */
export function toApiError(err: unknown): unknown {
  if (!axios.isAxiosError(err) || !err.response) return err;
  const { status, data } = err.response;
  if (isErrorResponse(data)) {
    return new ApiError(status, data.message, data.code, data.details);
  }
  return new ApiError(status, err.message);
}

export class BaseClient {
  protected baseUrl: string;
  protected resource: string;
  protected timeout: number;
  protected token?: string;

  constructor(resource: string, config: ClientConfig) {
    this.resource = "/" + resource;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 30000;
    this.token = config.token;
  }

  /** Update the auth token (e.g., after login/refresh) */
  public setToken(token: string | undefined): void {
    this.token = token;
  }

  protected buildPath(params: RequestParams): string {
    return params.path ? this.resource + "/" + params.path : this.resource;
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers: {
        "Content-Type": "application/json",
        Accept: params.responseType === "text" ? "text/csv, text/plain" : "application/json",
      },
    };

    if (this.token) {
      config.headers = {
        ...config.headers,
        Authorization: "Bearer " + this.token,
      };
    }

    if (params.query) {
      config.params = params.query;
    }

    if (params.responseType) {
      config.responseType = params.responseType;
    }

    return config;
  }

  public async get<T>(params: RequestParams = {}): Promise<T> {
    const path = this.buildPath(params);
    const config = this.buildConfig(params);
    try {
      const response = await axios.get<T>(path, config);
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }

  public async post<T>(params: RequestParams = {}): Promise<T> {
    const path = this.buildPath(params);
    const config = this.buildConfig(params);
    try {
      const response = await axios.post<T>(path, params.body, config);
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }
}
