/**
 * OAuth 1.0a request signing (RFC 5849, HMAC-SHA1).
 *
 * @packageDocumentation
 */

import { createHmac, randomBytes } from 'node:crypto';
import { normalizeParameters, percentEncode } from '../codec/percent-encoding.js';
import type { Parameter } from '../codec/percent-encoding.js';
import type { OAuth1SigningInput, SignedOAuth1Request } from './types.js';

/** Signature method identifier sent as `oauth_signature_method` */
export const SIGNATURE_METHOD = 'HMAC-SHA1';

/** Protocol version sent as `oauth_version` */
export const OAUTH_VERSION = '1.0';

/**
 * Characters used for nonces. Alphanumeric so the nonce survives any encoding unchanged.
 */
const NONCE_CHARSET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

const NONCE_LENGTH = 32;

/**
 * Generates a random nonce for a single signed request.
 */
export const generateNonce = (length: number = NONCE_LENGTH): string => {
  const bytes = randomBytes(length);
  let nonce = '';
  for (const byte of bytes) {
    nonce += NONCE_CHARSET.charAt(byte % NONCE_CHARSET.length);
  }
  return nonce;
};

/**
 * Current time in whole epoch seconds.
 */
export const currentTimestamp = (): number => Math.floor(Date.now() / 1000);

/**
 * Builds the signing key. The `&` separator is always present, even without a token secret.
 *
 * @example
 * ```typescript
 * createSigningKey('consumer-secret');           // 'consumer-secret&'
 * createSigningKey('consumer-secret', 'ts 1');   // 'consumer-secret&ts%201'
 * ```
 */
export const createSigningKey = (consumerSecret: string, tokenSecret?: string): string =>
  `${percentEncode(consumerSecret)}&${percentEncode(tokenSecret ?? '')}`;

/**
 * Base string URI for a request URL: lowercase scheme and host, no default port,
 * no query or fragment. A string that does not parse as a URL is returned as is.
 *
 * @example
 * ```typescript
 * normalizeBaseStringUri('HTTPS://API.Example.com:443/oauth/request_token?x=1');
 * // 'https://api.example.com/oauth/request_token'
 * ```
 */
export const normalizeBaseStringUri = (url: string): string => {
  if (!URL.canParse(url)) {
    return url;
  }
  const parsed = new URL(url);
  return `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
};

/**
 * Builds the signature base string: `METHOD&encode(uri)&encode(normalized parameters)`,
 * with the URI normalized by {@link normalizeBaseStringUri}.
 *
 * @param url - Request URL; query parameters must also be passed in `params`
 */
export const createSignatureBaseString = (
  method: string,
  url: string,
  params: readonly Parameter[]
): string =>
  [
    method.toUpperCase(),
    percentEncode(normalizeBaseStringUri(url)),
    percentEncode(normalizeParameters(params)),
  ].join('&');

/**
 * HMAC-SHA1 of the base string, base64-encoded.
 */
export const computeSignature = (baseString: string, signingKey: string): string =>
  createHmac('sha1', signingKey).update(baseString).digest('base64');

/**
 * Formats `OAuth key="value", ...` from the protocol parameters, sorted by key.
 * Each key and value is percent-encoded on its own.
 */
export const formatAuthorizationHeader = (params: readonly Parameter[]): string => {
  const pairs = params
    .map(([key, value]) => [percentEncode(key), percentEncode(value)] as const)
    .sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .map(([key, value]) => `${key}="${value}"`);
  return `OAuth ${pairs.join(', ')}`;
};

/**
 * Signs a request and produces its `Authorization` header.
 *
 * A fresh nonce and timestamp are drawn on every call unless the input pins them,
 * so signing the same request twice yields two different valid signatures.
 *
 * @example
 * ```typescript
 * const signed = signOAuth1Request({
 *   consumerKey: 'consumer-key',
 *   consumerSecret: 'consumer-secret',
 *   method: 'POST',
 *   url: 'https://api.example.com/oauth/request_token',
 *   oauthParameters: [['oauth_callback', 'https://app.example.com/callback']],
 * });
 * // signed.authorizationHeader => 'OAuth oauth_callback="https%3A%2F%2F...", ...'
 * ```
 */
export const signOAuth1Request = (input: OAuth1SigningInput): SignedOAuth1Request => {
  const protocolParameters: Parameter[] = [
    ['oauth_consumer_key', input.consumerKey],
    ['oauth_nonce', input.nonce ?? generateNonce()],
    ['oauth_signature_method', SIGNATURE_METHOD],
    ['oauth_timestamp', String(input.timestamp ?? currentTimestamp())],
    ['oauth_version', OAUTH_VERSION],
    ...(input.oauthParameters ?? []),
  ];

  const baseString = createSignatureBaseString(input.method, input.url, [
    ...protocolParameters,
    ...(input.bodyParameters ?? []),
  ]);
  const signature = computeSignature(
    baseString,
    createSigningKey(input.consumerSecret, input.tokenSecret)
  );

  const headerParameters: Parameter[] = [...protocolParameters, ['oauth_signature', signature]];

  return {
    baseString,
    signature,
    parameters: headerParameters,
    authorizationHeader: formatAuthorizationHeader(headerParameters),
  };
};
