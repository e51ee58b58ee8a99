import { cleanEnv, str, num } from 'envalid';
import {
  DEFAULT_BODYLESS_METHODS,
  DEFAULT_HASH_ALGORITHM,
  DEFAULT_SERVICE_NAME,
  HmacSignerConfig,
} from './hmac/types';
import { assertHashAlgorithm } from './hmac/signer';
import { HmacVerifierOptions } from './hmac/verifier';
import { HmacError } from './hmac/errors';

type Env = Record<string, string | undefined>;

const signerSpec = {
  HMAC_HASH_ALGORITHM: str({ default: DEFAULT_HASH_ALGORITHM }),
  HMAC_SERVICE_NAME: str({ default: DEFAULT_SERVICE_NAME }),
  HMAC_BODYLESS_METHODS: str({ default: DEFAULT_BODYLESS_METHODS.join(',') }),
};

// Replaces envalid's default reporter, which exits the process
function throwOnInvalid({ errors }: { errors: Partial<Record<string, Error>> }): void {
  const invalid = Object.keys(errors);
  if (invalid.length > 0) {
    throw new HmacError(`Invalid HMAC configuration: ${invalid.join(', ')}`, 'INVALID_CONFIG', 500);
  }
}

export function parseMethodList(value: string): string[] {
  return value
    .split(',')
    .map((method) => method.trim().toUpperCase())
    .filter((method) => method.length > 0);
}

/**
 * Signer configuration from environment variables
 *
 * - HMAC_HASH_ALGORITHM: sha256 | sha384 | sha512 (default: sha512)
 * - HMAC_SERVICE_NAME: credential prefix (default: NCSA.HMAC)
 * - HMAC_BODYLESS_METHODS: comma-separated methods signed without a body (default: GET)
 */
export function loadHmacConfig(env: Env = process.env): HmacSignerConfig {
  const parsed = cleanEnv(env, signerSpec, { reporter: throwOnInvalid });
  const algorithm = parsed.HMAC_HASH_ALGORITHM;
  assertHashAlgorithm(algorithm);

  return {
    algorithm,
    serviceName: parsed.HMAC_SERVICE_NAME,
    bodylessMethods: parseMethodList(parsed.HMAC_BODYLESS_METHODS),
  };
}

/**
 * Verifier options from environment variables.
 * HMAC_MAX_CLOCK_SKEW_MS enables the freshness check when greater than 0.
 */
export function loadVerifierOptions(env: Env = process.env): HmacVerifierOptions {
  const config = loadHmacConfig(env);
  const { HMAC_MAX_CLOCK_SKEW_MS } = cleanEnv(env, {
    HMAC_MAX_CLOCK_SKEW_MS: num({ default: 0 }),
  }, { reporter: throwOnInvalid });

  return {
    ...config,
    freshness: HMAC_MAX_CLOCK_SKEW_MS > 0 ? { maxSkewMs: HMAC_MAX_CLOCK_SKEW_MS } : undefined,
  };
}
