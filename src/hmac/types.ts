/**
 * HMAC Types
 *
 * Type definitions for request signing and verification.
 */

/**
 * Supported keyed-hash algorithms
 */
export const HASH_ALGORITHMS = ['sha256', 'sha384', 'sha512'] as const;

export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

/**
 * Any value JSON can carry. Bodies are digested through this closed union.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Request body as seen by the signer.
 * A top-level string is treated as an already-encoded body.
 */
export type RequestBody = JsonValue;

/**
 * Snapshot of the request fields that take part in the signature
 */
export interface RequestDetails {
  /** HTTP method, any case */
  method: string;
  /** Content-Type header value; unset is signed as an empty string */
  contentType?: string | null;
  /** Request path, lower-cased when canonicalized */
  path: string;
  /** Date header value; defaulted to the current time when absent */
  date?: string | null;
  /** Request body */
  params?: RequestBody | null;
}

/**
 * RequestDetails after date resolution, body-less stripping and digesting
 */
export interface ResolvedRequest {
  method: string;
  contentType: string;
  path: string;
  date: string;
  params?: RequestBody;
  contentDigest: string;
}

/**
 * Parsed form of the Authorization credential
 */
export interface Credential {
  serviceName: string;
  keyId: string;
  signature: string;
}

/**
 * Signer configuration, passed explicitly to signers and verifiers
 */
export interface HmacSignerConfig {
  /** Keyed-hash algorithm (default: sha512) */
  algorithm: HashAlgorithm;
  /** Credential prefix (default: NCSA.HMAC) */
  serviceName: string;
  /** Methods whose body is never signed (default: GET) */
  bodylessMethods: readonly string[];
}

export const DEFAULT_HASH_ALGORITHM: HashAlgorithm = 'sha512';

export const DEFAULT_SERVICE_NAME = 'NCSA.HMAC';

export const DEFAULT_BODYLESS_METHODS: readonly string[] = ['GET'];

export const DEFAULT_SIGNER_CONFIG: HmacSignerConfig = {
  algorithm: DEFAULT_HASH_ALGORITHM,
  serviceName: DEFAULT_SERVICE_NAME,
  bodylessMethods: DEFAULT_BODYLESS_METHODS,
};

/**
 * Header values an adapter writes back onto a signed request
 */
export interface SignedRequest {
  authorization: string;
  contentDigest: string;
  date: string;
  canonical: string;
}

/**
 * All header names as constants
 */
export const HMAC_HEADER_NAMES = {
  AUTHORIZATION: 'Authorization',
  CONTENT_DIGEST: 'Content-Digest',
  DATE: 'Date',
  CONTENT_TYPE: 'Content-Type',
} as const;

/**
 * Replay-window policy for the verifier
 */
export interface FreshnessPolicy {
  /** Maximum accepted distance between the Date header and now */
  maxSkewMs: number;
  /** Clock override */
  now?: () => Date;
}

export type VerificationOutcome =
  | 'authenticated'
  | 'unknown_key_id'
  | 'signature_mismatch'
  | 'malformed_credential'
  | 'stale_request';

/**
 * Result of verifying an inbound request
 */
export interface VerificationResult {
  authenticated: boolean;
  outcome: VerificationOutcome;
  keyId?: string;
  message?: string;
}

/**
 * Error codes carried by HmacError
 */
export type HmacErrorCode =
  | 'MISSING_KEY'
  | 'UNSUPPORTED_ALGORITHM'
  | 'INVALID_BODY'
  | 'INVALID_CONFIG'
  | 'KEY_STORE_UNAVAILABLE';
