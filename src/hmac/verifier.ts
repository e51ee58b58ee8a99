/**
 * HMAC Verifier
 *
 * Server-side verification of signed requests. Recomputes the signature from
 * the inbound snapshot and a looked-up secret, compares in constant time and
 * reports the outcome as a value.
 */

import * as crypto from 'crypto';
import {
  DEFAULT_SIGNER_CONFIG,
  FreshnessPolicy,
  HashAlgorithm,
  HmacSignerConfig,
  RequestDetails,
  VerificationOutcome,
  VerificationResult,
} from './types';
import { HmacSigner, parseCredential } from './signer';
import { KeyStore } from './key-store';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('verifier');

// Stands in for the secret of an unknown key so both failure paths hash once
const PLACEHOLDER_SECRET = 'unknown-key-placeholder';

const INVALID_CREDENTIALS = 'Invalid credentials';

export interface HmacVerifierOptions extends Partial<HmacSignerConfig> {
  /** Reject requests whose Date header is too far from now. Off when unset. */
  freshness?: FreshnessPolicy;
}

/**
 * Timing-safe comparison of two signatures
 */
export function verifySignature(expected: string, received: string): boolean {
  const a = Buffer.from(expected, 'utf8');
  const b = Buffer.from(received, 'utf8');
  if (a.length !== b.length) {
    return false;
  }
  return crypto.timingSafeEqual(a, b);
}

function failure(outcome: Exclude<VerificationOutcome, 'authenticated'>, message: string, keyId?: string): VerificationResult {
  return { authenticated: false, outcome, keyId, message };
}

/**
 * HMAC Verifier Class
 *
 * Usage:
 * ```typescript
 * const verifier = new HmacVerifier(new InMemoryKeyStore({ 'client-key-id': 'client-key-secret' }));
 * const result = await verifier.verify(details, req.headers.authorization);
 * if (!result.authenticated) {
 *   // respond 401
 * }
 * ```
 */
export class HmacVerifier {
  private readonly signer: HmacSigner;
  private readonly freshness?: FreshnessPolicy;

  constructor(
    private readonly keyStore: KeyStore,
    options: HmacVerifierOptions = {}
  ) {
    const { freshness, ...config } = options;
    this.signer = new HmacSigner(config);
    this.freshness = freshness;
  }

  public get algorithm(): HashAlgorithm {
    return this.signer.config.algorithm;
  }

  /**
   * Check the Date header against the freshness policy.
   * Always true when no policy is configured.
   */
  public isFresh(date: string | null | undefined): boolean {
    if (!this.freshness) {
      return true;
    }
    if (!date) {
      return false;
    }
    const timestamp = Date.parse(date);
    if (Number.isNaN(timestamp)) {
      return false;
    }
    const now = (this.freshness.now ?? (() => new Date()))().getTime();
    return Math.abs(now - timestamp) <= this.freshness.maxSkewMs;
  }

  /**
   * Verify an inbound request
   *
   * @param details - Snapshot of the inbound request
   * @param authorization - Authorization header value
   */
  public async verify(details: RequestDetails, authorization: string | undefined): Promise<VerificationResult> {
    const credential = authorization ? parseCredential(authorization) : null;
    if (!credential || credential.serviceName !== this.signer.config.serviceName) {
      log.debug('Rejected request with malformed credential', { path: details.path });
      return failure('malformed_credential', 'Malformed authorization credential');
    }

    const { keyId } = credential;

    // Date defaulting happens at signing time only
    if (!details.date) {
      log.debug('Rejected request without a date', { keyId, path: details.path });
      return failure('malformed_credential', 'Missing request date', keyId);
    }

    if (!this.isFresh(details.date)) {
      log.debug('Rejected stale request', { keyId, date: details.date });
      return failure('stale_request', 'Request date outside the accepted window', keyId);
    }

    const secret = await this.keyStore.getSecret(keyId);
    const expected = this.signer.signature(details, secret || PLACEHOLDER_SECRET);
    const matches = verifySignature(expected, credential.signature);

    if (!secret) {
      log.debug('Rejected request for unknown key id', { keyId });
      return failure('unknown_key_id', INVALID_CREDENTIALS, keyId);
    }

    if (!matches) {
      log.debug('Rejected request with signature mismatch', { keyId, path: details.path });
      return failure('signature_mismatch', INVALID_CREDENTIALS, keyId);
    }

    return { authenticated: true, outcome: 'authenticated', keyId };
  }
}

/**
 * Create a new HMAC verifier
 */
export function createHmacVerifier(keyStore: KeyStore, options?: HmacVerifierOptions): HmacVerifier {
  return new HmacVerifier(keyStore, options);
}
