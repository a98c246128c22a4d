/**
 * Typed error catalog. Every error carries the HTTP status the front end
 * answers with and a stable machine-readable code.
 */

export class ServiceError extends Error {
  constructor(
    public readonly code: number,
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// 400: rejected before any processing starts

export class ValidationError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, "VALIDATION_ERROR", message, details);
  }
}

// 401

export class UnauthorizedError extends ServiceError {
  constructor(details?: Record<string, unknown>) {
    super(401, "UNAUTHORIZED", "Missing or invalid bearer token", details);
  }
}

// 404, one document

export class DocumentNotFoundError extends ServiceError {
  constructor(
    public readonly key: string,
    options?: ErrorOptions,
  ) {
    super(404, "DOCUMENT_NOT_FOUND", `Document not found: ${key}`, { key }, options);
  }
}

// 413

export class ContentTooLargeError extends ServiceError {
  constructor(details?: Record<string, unknown>) {
    super(413, "CONTENT_TOO_LARGE", "Content too large", details);
  }
}

// 500, one document

export class IndexWriteError extends ServiceError {
  constructor(
    public readonly key: string,
    options?: ErrorOptions,
  ) {
    super(
      500,
      "INDEX_WRITE_FAILED",
      `Failed to write document to search index: ${key}`,
      { key },
      options,
    );
  }
}

// 503: a collaborator is unreachable; fails the whole operation

export class ConnectivityError extends ServiceError {}

export class StoreUnavailableError extends ConnectivityError {
  constructor(reason: string, options?: ErrorOptions) {
    super(503, "STORE_UNAVAILABLE", "Document store is unavailable", { reason }, options);
  }
}

export class IndexUnavailableError extends ConnectivityError {
  constructor(reason: string, options?: ErrorOptions) {
    super(503, "INDEX_UNAVAILABLE", "Search index is unavailable", { reason }, options);
  }
}

/** Message of any thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
