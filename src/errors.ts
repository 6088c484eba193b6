/**
 * Errors that map onto an HTTP status. Route handlers forward them to the
 * error middleware in app.ts, which turns them into `{ error }` responses.
 */
export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(statusCode: number, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class ValidationError extends HttpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, message, details);
    this.name = 'ValidationError';
  }
}

export class AuthenticationError extends HttpError {
  constructor(message = 'Invalid or missing credentials') {
    super(401, message);
    this.name = 'AuthenticationError';
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = 'Insufficient permissions') {
    super(403, message);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends HttpError {
  constructor(message: string) {
    super(409, message);
    this.name = 'ConflictError';
  }
}

/** The client went away before the batch was committed. */
export class RequestAbortedError extends HttpError {
  constructor(message = 'Request aborted before commit') {
    super(499, message);
    this.name = 'RequestAbortedError';
  }
}

export class PersistenceError extends HttpError {
  constructor(message: string, cause?: unknown) {
    super(500, message);
    this.name = 'PersistenceError';
    this.cause = cause;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
