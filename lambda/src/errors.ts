/**
 * Base error class for SmartPay adapter errors
 */
export class SmartPayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'SmartPayError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export type MappingErrorKind = 'UnsupportedCountry' | 'UnsupportedBrand' | 'IncompleteBillingAddress';

/**
 * Basket or customer data that cannot be expressed as a SmartPay order
 * Surfaced as a failed payment request redirecting to the fail URL
 */
export class MappingError extends SmartPayError {
  constructor(
    public readonly kind: MappingErrorKind,
    message: string
  ) {
    super(message, 'MAPPING_ERROR', 422);
    this.name = 'MappingError';
  }
}

/**
 * SmartPay rejected the refresh token or access token
 * Surfaced as a failed payment request redirecting to the fail URL
 */
export class GatewayAuthenticationError extends SmartPayError {
  constructor(message: string, cause?: Error) {
    super(message, 'GATEWAY_AUTHENTICATION_FAILED', 502, cause);
    this.name = 'GatewayAuthenticationError';
  }
}

/**
 * Data claiming to come from SmartPay whose signature does not verify
 */
export class SignatureError extends SmartPayError {
  constructor(subject: string) {
    super(`Illegal signature on ${subject}`, 'ILLEGAL_SIGNATURE', 400);
    this.name = 'SignatureError';
  }
}

/**
 * The request lacks the data an operation needs (query string, body)
 */
export class UnavailableContextError extends SmartPayError {
  constructor(missing: string) {
    super(`Request context not available: ${missing}`, 'UNAVAILABLE_CONTEXT', 400);
    this.name = 'UnavailableContextError';
  }
}
