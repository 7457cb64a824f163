// src/errors.ts

/**
 * Errors that terminate the current request with a fixed HTTP status.
 * `expose` decides whether the message is sent to the client; unexposed
 * errors are answered with a generic body and only logged.
 */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly expose: boolean = status < 500
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** 401: missing/forged/expired token, unknown signing key, bad claims. */
export class AuthenticationError extends HttpError {
  constructor(message: string) {
    super(401, message);
  }
}

/** 403: verified identity without a project usable on this platform. */
export class AuthorizationError extends HttpError {
  constructor(message: string) {
    super(403, message);
  }
}

/** 500: discovery or key-set fetch failed. Detail stays in the logs. */
export class ServiceError extends HttpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(500, message, false);
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/**
 * Rejected spawn-options submission. `reason` is the short stable text
 * ("ngpus not valid", ...) callers match on. Answered as a 500 with the
 * message exposed.
 */
export class ValidationError extends HttpError {
  constructor(readonly reason: string, message: string = reason) {
    super(500, message, true);
  }
}
