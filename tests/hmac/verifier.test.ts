/**
 * HMAC Verifier Test Suite
 *
 * - Authenticates requests signed with the looked-up secret
 * - Unknown key ids and signature mismatches share one public message
 * - Malformed credentials
 * - Optional freshness policy
 * - Timing-safe comparison
 */

import { HmacVerifier, createHmacVerifier, verifySignature } from '../../src/hmac/verifier';
import { InMemoryKeyStore, KeyStore } from '../../src/hmac/key-store';
import { HmacSigner, sign } from '../../src/hmac/signer';
import { KeyStoreError } from '../../src/hmac/errors';
import { RequestDetails } from '../../src/hmac/types';

const KEY_ID = 'SECRET_KEY_ID';
const SIGNING_KEY = 'abcdefghijkl';
const EXPECTED_SHA512 =
  'svO1jOUW+3wSVc/rzs4WQSOsWtABji6ppN0AkS++2SNvt6fPPvxonLV5WRgFaqnVc63RNmAndel8e/hxoNB4Pg==';

const request: RequestDetails = {
  method: 'POST',
  contentType: 'application/json',
  path: '/api/auth',
  date: 'Fri, 22 Jul 2016',
  params: { abc: 'def' },
};

describe('HMAC Verifier', () => {
  let keyStore: InMemoryKeyStore;
  let verifier: HmacVerifier;

  beforeEach(() => {
    keyStore = new InMemoryKeyStore({ [KEY_ID]: SIGNING_KEY });
    verifier = new HmacVerifier(keyStore);
  });

  describe('verify()', () => {
    test('authenticates a correctly signed request', async () => {
      const result = await verifier.verify(request, `NCSA.HMAC ${KEY_ID}:${EXPECTED_SHA512}`);
      expect(result).toEqual({ authenticated: true, outcome: 'authenticated', keyId: KEY_ID });
    });

    test('authenticates regardless of body key order', async () => {
      const body = { b: 2, a: [1, { d: 4, c: 3 }] };
      const authorization = sign({ ...request, params: body }, KEY_ID, SIGNING_KEY);
      const reordered = { a: [1, { c: 3, d: 4 }], b: 2 };

      const result = await verifier.verify({ ...request, params: reordered }, authorization);
      expect(result.outcome).toBe('authenticated');
    });

    test('reports a signature mismatch when the body was tampered with', async () => {
      const result = await verifier.verify(
        { ...request, params: { abc: 'tampered' } },
        `NCSA.HMAC ${KEY_ID}:${EXPECTED_SHA512}`
      );
      expect(result).toEqual({
        authenticated: false,
        outcome: 'signature_mismatch',
        keyId: KEY_ID,
        message: 'Invalid credentials',
      });
    });

    test('reports a signature mismatch for a different secret', async () => {
      const authorization = sign(request, KEY_ID, 'some-other-secret');
      const result = await verifier.verify(request, authorization);
      expect(result.outcome).toBe('signature_mismatch');
    });

    test('reports an unknown key id with the same message as a mismatch', async () => {
      const result = await verifier.verify(request, `NCSA.HMAC UNKNOWN_ID:${EXPECTED_SHA512}`);
      expect(result).toEqual({
        authenticated: false,
        outcome: 'unknown_key_id',
        keyId: 'UNKNOWN_ID',
        message: 'Invalid credentials',
      });
    });

    test('treats an empty stored secret as unknown', async () => {
      keyStore.set(KEY_ID, '');
      const result = await verifier.verify(request, `NCSA.HMAC ${KEY_ID}:${EXPECTED_SHA512}`);
      expect(result.outcome).toBe('unknown_key_id');
    });

    test.each([undefined, '', 'Bearer token', 'NCSA.HMAC no-signature', `OTHER.HMAC ${KEY_ID}:${EXPECTED_SHA512}`])(
      'reports a malformed credential for %p',
      async (authorization) => {
        const result = await verifier.verify(request, authorization);
        expect(result).toEqual({
          authenticated: false,
          outcome: 'malformed_credential',
          keyId: undefined,
          message: 'Malformed authorization credential',
        });
      }
    );

    test('verifies with the configured algorithm and service name', async () => {
      const sha256Verifier = createHmacVerifier(keyStore, { algorithm: 'sha256', serviceName: 'ACME.HMAC' });
      const authorization = sign(request, KEY_ID, SIGNING_KEY, 'sha256', 'ACME.HMAC');

      expect(sha256Verifier.algorithm).toBe('sha256');
      expect((await sha256Verifier.verify(request, authorization)).outcome).toBe('authenticated');
      expect((await verifier.verify(request, sign(request, KEY_ID, SIGNING_KEY, 'sha256'))).outcome).toBe(
        'signature_mismatch'
      );
    });

    test('accepts a GET signed without its body', async () => {
      const getRequest: RequestDetails = { method: 'GET', path: '/api/auth', date: 'Fri, 22 Jul 2016' };
      const authorization = sign(getRequest, KEY_ID, SIGNING_KEY);

      const result = await verifier.verify({ ...getRequest, params: { q: 'ignored' } }, authorization);
      expect(result.outcome).toBe('authenticated');
    });

    test('reports a request without a date as malformed before looking up the key', async () => {
      const getSecret = jest.fn().mockResolvedValue(SIGNING_KEY);
      const strict = new HmacVerifier({ getSecret });

      const result = await strict.verify({ ...request, date: undefined }, `NCSA.HMAC ${KEY_ID}:${EXPECTED_SHA512}`);
      expect(result).toEqual({
        authenticated: false,
        outcome: 'malformed_credential',
        keyId: KEY_ID,
        message: 'Missing request date',
      });
      expect(getSecret).not.toHaveBeenCalled();
    });

    test('propagates key store failures', async () => {
      const failingStore: KeyStore = {
        getSecret: jest.fn().mockRejectedValue(new KeyStoreError(KEY_ID)),
      };
      const failingVerifier = new HmacVerifier(failingStore);

      await expect(failingVerifier.verify(request, `NCSA.HMAC ${KEY_ID}:${EXPECTED_SHA512}`)).rejects.toThrow(
        KeyStoreError
      );
    });
  });

  // ============================================================================
  // FRESHNESS
  // ============================================================================

  describe('freshness policy', () => {
    const now = () => new Date('2024-03-01T12:00:00.000Z');

    test('is disabled by default', () => {
      expect(verifier.isFresh('Fri, 22 Jul 2016')).toBe(true);
      expect(verifier.isFresh(undefined)).toBe(true);
    });

    test('accepts dates inside the window', () => {
      const fresh = new HmacVerifier(keyStore, { freshness: { maxSkewMs: 60000, now } });
      expect(fresh.isFresh('2024-03-01T12:00:59.000Z')).toBe(true);
      expect(fresh.isFresh('2024-03-01T11:59:00.000Z')).toBe(true);
    });

    test('rejects dates outside the window or unparseable', () => {
      const fresh = new HmacVerifier(keyStore, { freshness: { maxSkewMs: 60000, now } });
      expect(fresh.isFresh('2024-03-01T12:01:00.001Z')).toBe(false);
      expect(fresh.isFresh('Fri, 22 Jul 2016')).toBe(false);
      expect(fresh.isFresh('not a date')).toBe(false);
      expect(fresh.isFresh('')).toBe(false);
    });

    test('reports stale requests before looking up the key', async () => {
      const getSecret = jest.fn().mockResolvedValue(SIGNING_KEY);
      const fresh = new HmacVerifier({ getSecret }, { freshness: { maxSkewMs: 60000, now } });

      const result = await fresh.verify(request, `NCSA.HMAC ${KEY_ID}:${EXPECTED_SHA512}`);
      expect(result).toEqual({
        authenticated: false,
        outcome: 'stale_request',
        keyId: KEY_ID,
        message: 'Request date outside the accepted window',
      });
      expect(getSecret).not.toHaveBeenCalled();
    });

    test('authenticates a fresh, correctly signed request', async () => {
      const fresh = new HmacVerifier(keyStore, { freshness: { maxSkewMs: 60000, now } });
      const signed = new HmacSigner({}, now).signRequest({ ...request, date: undefined }, KEY_ID, SIGNING_KEY);

      const result = await fresh.verify({ ...request, date: signed.date }, signed.authorization);
      expect(result.outcome).toBe('authenticated');
    });
  });

  describe('verifySignature()', () => {
    test('compares signatures exactly', () => {
      expect(verifySignature(EXPECTED_SHA512, EXPECTED_SHA512)).toBe(true);
      expect(verifySignature(EXPECTED_SHA512, EXPECTED_SHA512.toLowerCase())).toBe(false);
    });

    test('returns false for different lengths', () => {
      expect(verifySignature(EXPECTED_SHA512, EXPECTED_SHA512.slice(0, -2))).toBe(false);
      expect(verifySignature('', 'x')).toBe(false);
    });
  });
});
