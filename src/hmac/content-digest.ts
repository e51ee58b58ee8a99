/**
 * Content Digest
 *
 * Stable MD5 fingerprint of a request body. Bodies are encoded as compact
 * JSON with object keys sorted, so key insertion order never changes the
 * digest.
 */

import * as crypto from 'crypto';
import { JsonValue, RequestBody } from './types';
import { ContentDigestError } from './errors';

/**
 * Type guard for values a body may carry: plain objects, arrays, strings,
 * finite numbers, booleans and null
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) {
      return false;
    }
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

/**
 * Encode a value as compact JSON with object keys in code unit order
 */
export function canonicalJson(value: JsonValue): string {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return JSON.stringify(value);
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ContentDigestError(`Cannot encode non-finite number ${value}`);
    }
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }

  const members = Object.keys(value)
    .sort()
    .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
  return `{${members.join(',')}}`;
}

/**
 * True for bodies that carry nothing to sign
 */
export function isEmptyBody(body: RequestBody | null | undefined): boolean {
  if (body === undefined || body === null) {
    return true;
  }
  return typeof body === 'object' && !Array.isArray(body) && Object.keys(body).length === 0;
}

/**
 * Compute the content digest of a body.
 * Returns an empty string when there is no body.
 */
export function contentDigest(body?: RequestBody | null): string {
  if (body === undefined || isEmptyBody(body)) {
    return '';
  }

  const encoded = typeof body === 'string' ? body : canonicalJson(body);
  return crypto.createHash('md5').update(encoded, 'utf8').digest('hex');
}
