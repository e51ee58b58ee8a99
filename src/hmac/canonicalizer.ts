/**
 * Canonicalizer
 *
 * Turns a RequestDetails snapshot into the single string that gets signed.
 * Each step returns a new snapshot; the input is never modified.
 */

import { DEFAULT_BODYLESS_METHODS, RequestDetails, ResolvedRequest } from './types';
import { contentDigest } from './content-digest';

export interface CanonicalizeOptions {
  /** Methods whose body is dropped before digesting (default: GET) */
  bodylessMethods?: readonly string[];
  /** Clock used when the request carries no date */
  now?: () => Date;
}

/**
 * Current time in extended ISO-8601 form with a UTC designator
 */
export function defaultRequestDate(now: () => Date = () => new Date()): string {
  return now().toISOString();
}

function resolveDate(details: RequestDetails, now?: () => Date): RequestDetails {
  if (details.date) {
    return details;
  }
  return { ...details, date: defaultRequestDate(now) };
}

function dropBodylessParams(details: RequestDetails, bodylessMethods: readonly string[]): RequestDetails {
  const method = details.method.toUpperCase();
  if (!bodylessMethods.some((m) => m.toUpperCase() === method)) {
    return details;
  }
  const { params: _dropped, ...rest } = details;
  return rest;
}

/**
 * Resolve date, strip body-less params and compute the content digest
 */
export function resolveRequest(details: RequestDetails, options: CanonicalizeOptions = {}): ResolvedRequest {
  const dated = resolveDate(details, options.now);
  const stripped = dropBodylessParams(dated, options.bodylessMethods ?? DEFAULT_BODYLESS_METHODS);

  const resolved: ResolvedRequest = {
    method: stripped.method,
    contentType: stripped.contentType ?? '',
    path: stripped.path,
    date: stripped.date ?? '',
    contentDigest: contentDigest(stripped.params),
  };
  if (stripped.params !== undefined && stripped.params !== null) {
    resolved.params = stripped.params;
  }
  return resolved;
}

/**
 * Join the resolved fields in signing order
 */
export function canonicalString(resolved: ResolvedRequest): string {
  return [
    resolved.method.toUpperCase(),
    resolved.contentType,
    resolved.contentDigest,
    resolved.date,
    resolved.path.toLowerCase(),
  ].join('\n');
}

/**
 * Build the canonical string for a request
 *
 * Format: METHOD\ncontent-type\ncontent-digest\ndate\npath
 */
export function canonicalizeRequest(details: RequestDetails, options: CanonicalizeOptions = {}): string {
  return canonicalString(resolveRequest(details, options));
}
