// ═══════════════════════════════════════════════════════════════════════════
// Error types - only input-availability and snapshot failures reach the CLI
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base application error with structured data
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code?: string;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code || 'INTERNAL_ERROR';
    this.context = options.context;

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Required input is absent: no data directory, no catalog files, or no catalog records.
 */
export class MissingInputError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, {
      code: 'MISSING_INPUT',
      context,
    });
  }
}

/**
 * The persisted snapshot document could not be read or failed validation.
 */
export class SnapshotError extends AppError {
  public readonly filePath: string;

  constructor(filePath: string, message: string, cause?: unknown) {
    super(`Snapshot ${filePath}: ${message}`, {
      code: 'SNAPSHOT_ERROR',
      context: { filePath },
      cause,
    });
    this.filePath = filePath;
  }
}

/**
 * Safely extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}

/**
 * Errors that end the run with a non-zero exit instead of a stack trace.
 */
export function isFatalInputError(error: unknown): error is MissingInputError | SnapshotError {
  return error instanceof MissingInputError || error instanceof SnapshotError;
}
