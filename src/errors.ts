import type { ResolvedResource } from "./types.js";

/** Error that maps directly onto an HTTP status code. */
export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly headers: Readonly<Record<string, string>> = {},
  ) {
    super(message);
    this.name = "HttpError";
  }
}

/** The request path does not map to any file, directly or via an index file. */
export class NotFoundError extends HttpError {
  constructor(public readonly urlPath: string) {
    super(404, `No file for '${urlPath}'`);
    this.name = "NotFoundError";
  }
}

/** The request path cannot be decoded or escapes the document root. */
export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(400, message);
    this.name = "BadRequestError";
  }
}

/**
 * Static serving refused the method. Carries the file the path resolved to so
 * the override rule can serve it instead.
 */
export class MethodNotAllowedError extends HttpError {
  constructor(
    public readonly method: string,
    public readonly resource: ResolvedResource,
    allowed: readonly string[],
  ) {
    super(405, `Method ${method} not allowed on '${resource.urlPath}'`, {
      Allow: allowed.join(", "),
    });
    this.name = "MethodNotAllowedError";
  }
}

/** Thrown at start-up when a setting is missing or malformed. */
export class ConfigurationError extends Error {
  constructor(
    public readonly setting: string,
    message: string,
  ) {
    super(`${setting}: ${message}`);
    this.name = "ConfigurationError";
  }
}
