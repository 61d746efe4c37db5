/**
 * shared/errors.ts — Error taxonomy
 *
 * Every error the core raises carries a stable `code` and the HTTP `status`
 * the route layer answers with. Nothing here retries or recovers.
 */

export class AppError extends Error {
  code: string;
  status: number;
  constructor(message: string, code: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    this.status = status;
  }
}

/** Filter criteria malformed. Raised before any fetch is attempted. */
export class InvalidFilterError extends AppError {
  details: string[];
  constructor(message: string, details: string[] = []) {
    super(message, 'INVALID_FILTER', 400);
    this.name = 'InvalidFilterError';
    this.details = details;
  }
}

/** Underlying homeowner or portal-user fetch failed. */
export class DataSourceError extends AppError {
  source: string;
  constructor(source: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${source} source unavailable: ${reason}`, 'DATA_SOURCE_UNAVAILABLE', 503, { cause });
    this.name = 'DataSourceError';
    this.source = source;
  }
}

/** Snapshot violates an identity invariant (e.g. duplicate homeowner ids). */
export class DataIntegrityError extends AppError {
  constructor(message: string) {
    super(message, 'DATA_INTEGRITY', 500);
    this.name = 'DataIntegrityError';
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
