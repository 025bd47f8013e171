/**
 * Query-string building shared by the OAuth1 and OAuth2 authorize URLs.
 *
 * @packageDocumentation
 */

import { percentEncode } from './percent-encoding.js';

/**
 * OAuth 2.0 `response_type` values.
 */
export const ResponseType = {
  Code: 'code',
  Token: 'token',
} as const;

export type ResponseType = (typeof ResponseType)[keyof typeof ResponseType];

/**
 * PKCE `code_challenge_method` values (RFC 7636).
 */
export const CodeChallengeMethod = {
  S256: 'S256',
  Plain: 'plain',
} as const;

export type CodeChallengeMethod = (typeof CodeChallengeMethod)[keyof typeof CodeChallengeMethod];

/**
 * A query parameter. `undefined` values are left out of the query.
 */
export type QueryParameter = readonly [key: string, value: string | undefined];

/**
 * Builds a `?key=value&...` query string, preserving parameter order.
 *
 * @returns The query string including the leading `?`, or `''` when nothing is set
 *
 * @example
 * ```typescript
 * buildQueryString([['response_type', ResponseType.Code], ['state', undefined]]);
 * // '?response_type=code'
 * ```
 */
export const buildQueryString = (params: readonly QueryParameter[]): string => {
  const pairs: string[] = [];
  for (const [key, value] of params) {
    if (value !== undefined) {
      pairs.push(`${percentEncode(key)}=${percentEncode(value)}`);
    }
  }
  return pairs.length > 0 ? `?${pairs.join('&')}` : '';
};

/**
 * Appends a query string to an endpoint, joining with `&` when it already has one.
 */
export const appendQuery = (endpoint: string, params: readonly QueryParameter[]): string => {
  const query = buildQueryString(params);
  if (query === '') {
    return endpoint;
  }
  return endpoint.includes('?') ? `${endpoint}&${query.slice(1)}` : `${endpoint}${query}`;
};
