/**
 * Key Store
 *
 * Secret lookup by key id for the verifier.
 */

import type { Redis } from 'ioredis';
import { KeyStoreError } from './errors';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('key-store');

/**
 * Resolves a key id to its shared secret, or null when the id is unknown
 */
export interface KeyStore {
  getSecret(keyId: string): Promise<string | null>;
}

/**
 * Key store backed by a Map, for tests and statically configured clients
 */
export class InMemoryKeyStore implements KeyStore {
  private readonly keys: Map<string, string>;

  constructor(keys: Record<string, string> | Map<string, string> = {}) {
    this.keys = keys instanceof Map ? new Map(keys) : new Map(Object.entries(keys));
  }

  public async getSecret(keyId: string): Promise<string | null> {
    return this.keys.get(keyId) ?? null;
  }

  public set(keyId: string, keySecret: string): void {
    this.keys.set(keyId, keySecret);
  }

  public delete(keyId: string): boolean {
    return this.keys.delete(keyId);
  }
}

export interface RedisKeyStoreOptions {
  /** Key prefix (default: hmac:key) */
  keyPrefix?: string;
}

export const DEFAULT_KEY_PREFIX = 'hmac:key';

/**
 * Redis-backed key store
 *
 * Key format: {prefix}:{keyId}, value is the secret.
 */
export class RedisKeyStore implements KeyStore {
  private readonly keyPrefix: string;

  constructor(
    private readonly redis: Pick<Redis, 'get'>,
    options: RedisKeyStoreOptions = {}
  ) {
    this.keyPrefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
  }

  /**
   * Build Redis key for a key id
   */
  public buildKey(keyId: string): string {
    return `${this.keyPrefix}:${keyId}`;
  }

  public async getSecret(keyId: string): Promise<string | null> {
    try {
      const secret = await this.redis.get(this.buildKey(keyId));
      return secret ? secret : null;
    } catch (error) {
      // Fail closed: a lookup error is not an unknown key
      log.error('Redis error during key lookup', { keyId, error });
      throw new KeyStoreError(keyId, error);
    }
  }
}

/**
 * Create a key store from a static record of key ids to secrets
 */
export function createInMemoryKeyStore(keys?: Record<string, string>): InMemoryKeyStore {
  return new InMemoryKeyStore(keys);
}
