/**
 * HMAC Signer
 *
 * Computes keyed-hash signatures over canonical request strings and formats
 * the Authorization credential.
 */

import * as crypto from 'crypto';
import {
  Credential,
  DEFAULT_HASH_ALGORITHM,
  DEFAULT_SERVICE_NAME,
  DEFAULT_SIGNER_CONFIG,
  HASH_ALGORITHMS,
  HashAlgorithm,
  HmacSignerConfig,
  RequestDetails,
  SignedRequest,
} from './types';
import { CanonicalizeOptions, canonicalString, canonicalizeRequest, resolveRequest } from './canonicalizer';
import { SigningError, UnsupportedAlgorithmError } from './errors';

export function isHashAlgorithm(value: string): value is HashAlgorithm {
  return HASH_ALGORITHMS.some((algorithm) => algorithm === value);
}

/**
 * Throws UnsupportedAlgorithmError unless the value names a supported algorithm
 */
export function assertHashAlgorithm(value: string): asserts value is HashAlgorithm {
  if (!isHashAlgorithm(value)) {
    throw new UnsupportedAlgorithmError(value);
  }
}

function requireKey(value: string | null | undefined, field: 'keyId' | 'keySecret'): string {
  if (value === undefined || value === null || value === '') {
    throw new SigningError(field);
  }
  return value;
}

/**
 * Keyed hash of an already-canonicalized string, base64 encoded
 */
export function hmacDigest(message: string, keySecret: string, algorithm: HashAlgorithm): string {
  assertHashAlgorithm(algorithm);
  return crypto.createHmac(algorithm, keySecret).update(message, 'utf8').digest('base64');
}

/**
 * Compute the signature for a request
 */
export function signature(
  details: RequestDetails,
  keySecret: string,
  algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM,
  options: CanonicalizeOptions = {}
): string {
  return hmacDigest(canonicalizeRequest(details, options), keySecret, algorithm);
}

export function formatCredential(credential: Credential): string {
  return `${credential.serviceName} ${credential.keyId}:${credential.signature}`;
}

/**
 * Split an Authorization value into its parts.
 * Returns null when the value is not of the form "<service> <keyId>:<signature>".
 */
export function parseCredential(authorization: string): Credential | null {
  const space = authorization.lastIndexOf(' ');
  if (space <= 0) {
    return null;
  }

  const serviceName = authorization.slice(0, space);
  const token = authorization.slice(space + 1);
  const colon = token.lastIndexOf(':');
  if (colon <= 0 || colon === token.length - 1) {
    return null;
  }

  return {
    serviceName,
    keyId: token.slice(0, colon),
    signature: token.slice(colon + 1),
  };
}

/**
 * Sign a request and return the Authorization credential
 *
 * @throws SigningError when keyId or keySecret is missing
 */
export function sign(
  details: RequestDetails,
  keyId: string | null | undefined,
  keySecret: string | null | undefined,
  algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM,
  serviceName: string = DEFAULT_SERVICE_NAME,
  options: CanonicalizeOptions = {}
): string {
  const id = requireKey(keyId, 'keyId');
  const secret = requireKey(keySecret, 'keySecret');
  return formatCredential({
    serviceName,
    keyId: id,
    signature: signature(details, secret, algorithm, options),
  });
}

/**
 * HMAC Signer Class
 *
 * Usage:
 * ```typescript
 * const signer = new HmacSigner({ algorithm: 'sha256' });
 * const signed = signer.signRequest(
 *   { method: 'POST', path: '/api/auth', contentType: 'application/json', params: { abc: 'def' } },
 *   'client-key-id',
 *   'client-key-secret'
 * );
 * ```
 */
export class HmacSigner {
  public readonly config: HmacSignerConfig;
  private readonly now?: () => Date;

  constructor(config: Partial<HmacSignerConfig> = {}, now?: () => Date) {
    const algorithm = config.algorithm ?? DEFAULT_SIGNER_CONFIG.algorithm;
    assertHashAlgorithm(algorithm);

    this.config = {
      algorithm,
      serviceName: config.serviceName ?? DEFAULT_SIGNER_CONFIG.serviceName,
      bodylessMethods: config.bodylessMethods ?? DEFAULT_SIGNER_CONFIG.bodylessMethods,
    };
    this.now = now;
  }

  private get options(): CanonicalizeOptions {
    return { bodylessMethods: this.config.bodylessMethods, now: this.now };
  }

  public canonicalize(details: RequestDetails): string {
    return canonicalizeRequest(details, this.options);
  }

  public signature(details: RequestDetails, keySecret: string): string {
    return signature(details, keySecret, this.config.algorithm, this.options);
  }

  public sign(details: RequestDetails, keyId: string | null | undefined, keySecret: string | null | undefined): string {
    return sign(details, keyId, keySecret, this.config.algorithm, this.config.serviceName, this.options);
  }

  /**
   * Sign a request and return every header value an adapter must write back.
   * The date and digest are resolved once, so the headers always match what
   * was signed.
   */
  public signRequest(
    details: RequestDetails,
    keyId: string | null | undefined,
    keySecret: string | null | undefined
  ): SignedRequest {
    const id = requireKey(keyId, 'keyId');
    const secret = requireKey(keySecret, 'keySecret');

    const resolved = resolveRequest(details, this.options);
    const canonical = canonicalString(resolved);

    return {
      authorization: formatCredential({
        serviceName: this.config.serviceName,
        keyId: id,
        signature: hmacDigest(canonical, secret, this.config.algorithm),
      }),
      contentDigest: resolved.contentDigest,
      date: resolved.date,
      canonical,
    };
  }
}

/**
 * Create a new HMAC signer with custom config
 */
export function createHmacSigner(config?: Partial<HmacSignerConfig>, now?: () => Date): HmacSigner {
  return new HmacSigner(config, now);
}
