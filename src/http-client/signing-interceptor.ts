/**
 * Signing Interceptor
 *
 * axios request interceptor that signs every outgoing request and writes
 * the Authorization, Content-Digest and Date headers.
 *
 * Usage:
 * ```typescript
 * const client = axios.create({ baseURL: 'http://records-service:3000' });
 * attachHmacSigning(client, { keyId: 'client-key-id', keySecret: 'client-key-secret' });
 * await client.post('/api/records', { name: 'example' });
 * ```
 */

import { AxiosHeaderValue, AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { HmacSigner } from '../hmac/signer';
import { HmacError, SigningError } from '../hmac/errors';
import { isJsonValue } from '../hmac/content-digest';
import { HMAC_HEADER_NAMES, RequestBody, RequestDetails } from '../hmac/types';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('signing-interceptor');

export interface SigningInterceptorOptions {
  keyId: string;
  keySecret: string;
  /** Signer carrying algorithm, service name and body-less methods (default: new HmacSigner()) */
  signer?: HmacSigner;
}

export type RequestInterceptor = (config: InternalAxiosRequestConfig) => InternalAxiosRequestConfig;

const ABSOLUTE_URL = /^[a-z][a-z\d+\-.]*:\/\//i;

function headerString(value: AxiosHeaderValue | undefined): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  return undefined;
}

/**
 * Path of the request URL, resolved against baseURL the way axios joins them
 */
export function requestPath(config: Pick<InternalAxiosRequestConfig, 'url' | 'baseURL'>): string {
  const url = config.url ?? '';
  let full = url;
  if (config.baseURL && !ABSOLUTE_URL.test(url)) {
    full = url ? `${config.baseURL.replace(/\/+$/, '')}/${url.replace(/^\/+/, '')}` : config.baseURL;
  }
  return new URL(full, 'http://localhost').pathname;
}

function requestBody(data: unknown): RequestBody | undefined {
  if (data === undefined || data === null) {
    return undefined;
  }
  if (Buffer.isBuffer(data)) {
    return data.length > 0 ? data.toString('utf8') : undefined;
  }
  if (!isJsonValue(data)) {
    throw new HmacError('Request body cannot be signed', 'INVALID_BODY', 400);
  }
  return data;
}

/**
 * Snapshot the signed fields of an outgoing axios request
 */
export function requestDetailsFromAxios(config: InternalAxiosRequestConfig): RequestDetails {
  return {
    method: config.method ?? 'get',
    contentType: headerString(config.headers.get(HMAC_HEADER_NAMES.CONTENT_TYPE)) ?? '',
    path: requestPath(config),
    date: headerString(config.headers.get(HMAC_HEADER_NAMES.DATE)),
    params: requestBody(config.data),
  };
}

/**
 * Create a request interceptor that signs with the given key pair
 *
 * @throws SigningError when keyId or keySecret is missing
 */
export function createSigningInterceptor(options: SigningInterceptorOptions): RequestInterceptor {
  if (!options.keyId) {
    throw new SigningError('keyId');
  }
  if (!options.keySecret) {
    throw new SigningError('keySecret');
  }
  const signer = options.signer ?? new HmacSigner();

  return (config) => {
    const body = requestBody(config.data);
    // axios would otherwise add the JSON content type after signing
    if (body !== undefined && typeof body !== 'string' && !config.headers.get(HMAC_HEADER_NAMES.CONTENT_TYPE)) {
      config.headers.set(HMAC_HEADER_NAMES.CONTENT_TYPE, 'application/json');
    }

    const details = requestDetailsFromAxios(config);
    const signed = signer.signRequest(details, options.keyId, options.keySecret);

    config.headers.set(HMAC_HEADER_NAMES.AUTHORIZATION, signed.authorization);
    config.headers.set(HMAC_HEADER_NAMES.CONTENT_DIGEST, signed.contentDigest);
    config.headers.set(HMAC_HEADER_NAMES.DATE, signed.date);

    log.debug('Signed outgoing request', { method: details.method, path: details.path, keyId: options.keyId });
    return config;
  };
}

/**
 * Sign every request made through an axios instance
 *
 * @returns interceptor id, for `instance.interceptors.request.eject`
 */
export function attachHmacSigning(instance: AxiosInstance, options: SigningInterceptorOptions): number {
  return instance.interceptors.request.use(createSigningInterceptor(options));
}
