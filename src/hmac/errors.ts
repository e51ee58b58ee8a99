/**
 * HMAC Errors
 *
 * Custom error classes for signing failures. Verification failures are
 * reported as results, not thrown.
 */

import { HmacErrorCode } from './types';

/**
 * Base error for the signing scheme
 */
export class HmacError extends Error {
  constructor(
    message: string,
    public readonly code: HmacErrorCode,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = 'HmacError';
    Object.setPrototypeOf(this, HmacError.prototype);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Thrown when a key id or key secret is missing at sign time
 */
export class SigningError extends HmacError {
  constructor(public readonly field: 'keyId' | 'keySecret') {
    super(`${field} is required`, 'MISSING_KEY', 500);
    this.name = 'SigningError';
    Object.setPrototypeOf(this, SigningError.prototype);
  }
}

/**
 * Thrown when the configured hash algorithm is not supported
 */
export class UnsupportedAlgorithmError extends HmacError {
  constructor(public readonly algorithm: string) {
    super(`Unsupported hash algorithm: ${algorithm}`, 'UNSUPPORTED_ALGORITHM', 500);
    this.name = 'UnsupportedAlgorithmError';
    Object.setPrototypeOf(this, UnsupportedAlgorithmError.prototype);
  }
}

/**
 * Thrown when a body cannot be encoded for digesting
 */
export class ContentDigestError extends HmacError {
  constructor(message: string) {
    super(message, 'INVALID_BODY', 400);
    this.name = 'ContentDigestError';
    Object.setPrototypeOf(this, ContentDigestError.prototype);
  }
}

/**
 * Thrown when the key store backend cannot answer a lookup
 */
export class KeyStoreError extends HmacError {
  constructor(public readonly keyId: string, public readonly originalError?: unknown) {
    super(`Key lookup unavailable for ${keyId}`, 'KEY_STORE_UNAVAILABLE', 503);
    this.name = 'KeyStoreError';
    Object.setPrototypeOf(this, KeyStoreError.prototype);
  }
}
