/**
 * Base class for everything the crawler raises on purpose.
 */
export class QueryError extends Error {
  constructor(
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = "QueryError";
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Bad caller input (unknown query type, inverted range). Never retried. */
export class ValidationError extends QueryError {
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = "ValidationError";
  }
}

/** Network-level failure: connection, timeout, non-2xx status. */
export class TransportError extends QueryError {
  constructor(
    message: string,
    public status?: number,
    details?: unknown
  ) {
    super(message, details);
    this.name = "TransportError";
  }
}

/** The service answered, but with GraphQL errors or an unexpected shape. */
export class ProtocolError extends QueryError {
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = "ProtocolError";
  }
}

/** Checkpoint or output file could not be read or written. */
export class PersistenceError extends QueryError {
  constructor(
    message: string,
    public path: string,
    details?: unknown
  ) {
    super(message, details);
    this.name = "PersistenceError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
