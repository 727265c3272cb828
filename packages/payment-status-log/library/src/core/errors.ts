/**
 * Base error class for payment status log errors
 */
export class PaymentStatusLogError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'PaymentStatusLogError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Entry rejected before it reached storage
 * Maps to HTTP 400 Bad Request in API responses
 */
export class InvalidStatusEntryError extends PaymentStatusLogError {
  constructor(reason: string) {
    super(
      `Invalid payment status entry: ${reason}`,
      'INVALID_STATUS_ENTRY',
      400
    );
    this.name = 'InvalidStatusEntryError';
  }
}

/**
 * Underlying storage service error
 * Maps to HTTP 500 Internal Server Error in API responses
 */
export class StorageServiceError extends PaymentStatusLogError {
  constructor(message: string, cause?: Error) {
    super(
      `Storage service error: ${message}`,
      'STORAGE_ERROR',
      500,
      cause
    );
    this.name = 'StorageServiceError';
  }
}
