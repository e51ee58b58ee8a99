/**
 * HMAC Request Signing Module
 *
 * Symmetric-key signing of HTTP requests under the "NCSA.HMAC" scheme.
 *
 * Features:
 * - Deterministic canonical string: METHOD, content type, content digest, date, path
 * - MD5 content digest over sorted compact JSON, independent of key order
 * - HMAC-SHA512 signatures by default, SHA-256 and SHA-384 selectable
 * - Timing-safe verification against a pluggable key store
 *
 * Usage (Client/Signer):
 * ```typescript
 * import { sign } from 'ncsa-hmac';
 *
 * const authorization = sign(
 *   { method: 'POST', path: '/api/auth', contentType: 'application/json', params: { abc: 'def' } },
 *   'client-key-id',
 *   'client-key-secret'
 * );
 * // => 'NCSA.HMAC client-key-id:<base64 signature>'
 * ```
 *
 * Usage (Server/Verifier):
 * ```typescript
 * import { HmacVerifier, InMemoryKeyStore } from 'ncsa-hmac';
 *
 * const verifier = new HmacVerifier(new InMemoryKeyStore({ 'client-key-id': 'client-key-secret' }));
 * const result = await verifier.verify(details, authorization);
 * ```
 *
 * The hash algorithm is not part of the credential; signer and verifier
 * must be configured with the same one.
 */

// Types
export {
  HASH_ALGORITHMS,
  HashAlgorithm,
  JsonValue,
  JsonObject,
  RequestBody,
  RequestDetails,
  ResolvedRequest,
  Credential,
  HmacSignerConfig,
  SignedRequest,
  FreshnessPolicy,
  VerificationOutcome,
  VerificationResult,
  HmacErrorCode,
  HMAC_HEADER_NAMES,
  DEFAULT_HASH_ALGORITHM,
  DEFAULT_SERVICE_NAME,
  DEFAULT_BODYLESS_METHODS,
  DEFAULT_SIGNER_CONFIG,
} from './types';

// Errors
export {
  HmacError,
  SigningError,
  UnsupportedAlgorithmError,
  ContentDigestError,
  KeyStoreError,
} from './errors';

// Content digest
export { contentDigest, canonicalJson, isEmptyBody, isJsonValue } from './content-digest';

// Canonicalization
export {
  CanonicalizeOptions,
  canonicalizeRequest,
  canonicalString,
  resolveRequest,
  defaultRequestDate,
} from './canonicalizer';

// Signer (Client-side)
export {
  HmacSigner,
  createHmacSigner,
  sign,
  signature,
  hmacDigest,
  formatCredential,
  parseCredential,
  isHashAlgorithm,
  assertHashAlgorithm,
} from './signer';

// Key stores
export {
  KeyStore,
  InMemoryKeyStore,
  RedisKeyStore,
  RedisKeyStoreOptions,
  DEFAULT_KEY_PREFIX,
  createInMemoryKeyStore,
} from './key-store';

// Verifier (Server-side)
export {
  HmacVerifier,
  HmacVerifierOptions,
  createHmacVerifier,
  verifySignature,
} from './verifier';
