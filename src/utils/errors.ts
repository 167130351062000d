/**
 * @fileoverview Standardized error types.
 *
 * Only faults that cross a component boundary are modelled as exceptions:
 * - AppError: Base class for application-specific errors
 * - StorageError: the persistent store failed to read or write
 * - ModelUnavailableError: the model endpoint could not produce a response
 *
 * Missing keys or task ids are not errors; the store returns null/false
 * and the tool layer turns that into a NotFound outcome.
 */

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * I/O failure inside the store. The failing operation wrote nothing.
 */
export class StorageError extends AppError {
  constructor(operation: string, cause: unknown) {
    super(
      `Storage operation "${operation}" failed: ${errorMessage(cause)}`,
      'STORAGE_ERROR',
      false,
      { operation }
    );
    this.name = 'StorageError';
    this.cause = cause;
  }
}

/**
 * Model call failed (network, auth, rate limit, aborted request).
 * Recoverable at the turn level.
 */
export class ModelUnavailableError extends AppError {
  constructor(cause: unknown) {
    super(`Model unavailable: ${errorMessage(cause)}`, 'MODEL_UNAVAILABLE', true);
    this.name = 'ModelUnavailableError';
    this.cause = cause;
  }
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
