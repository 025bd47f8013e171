/**
 * RFC 3986 percent-encoding and parameter normalization.
 *
 * The same encoder feeds OAuth1 signature base strings, the OAuth1
 * `Authorization` header, query strings and form bodies.
 *
 * @packageDocumentation
 */

import { Buffer } from 'node:buffer';

/**
 * A single request parameter. Keys may repeat.
 */
export type Parameter = readonly [key: string, value: string];

const isUnreservedByte = (byte: number): boolean =>
  (byte >= 0x41 && byte <= 0x5a) ||
  (byte >= 0x61 && byte <= 0x7a) ||
  (byte >= 0x30 && byte <= 0x39) ||
  byte === 0x2d ||
  byte === 0x2e ||
  byte === 0x5f ||
  byte === 0x7e;

/**
 * Percent-encodes a string per RFC 3986.
 *
 * Only the unreserved characters `A-Z a-z 0-9 - . _ ~` pass through; every other
 * UTF-8 byte becomes `%XX` with uppercase hex. Space is `%20`, never `+`.
 *
 * @example
 * ```typescript
 * percentEncode('Ladies + Gentlemen'); // 'Ladies%20%2B%20Gentlemen'
 * percentEncode("it's (fine)*!");      // 'it%27s%20%28fine%29%2A%21'
 * ```
 */
export const percentEncode = (input: string): string => {
  // Lone surrogates become U+FFFD (EF BF BD) rather than throwing
  let encoded = '';
  for (const byte of Buffer.from(input, 'utf8')) {
    encoded += isUnreservedByte(byte)
      ? String.fromCharCode(byte)
      : `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
  }
  return encoded;
};

const compare = (a: string, b: string): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

/**
 * Normalizes a parameter set for a signature base string.
 *
 * Keys and values are percent-encoded, exact duplicate pairs are dropped, and the
 * pairs are sorted by encoded key, then encoded value, before being joined as
 * `key=value` with `&`. The output does not depend on input order.
 *
 * @example
 * ```typescript
 * normalizeParameters([['b', '2'], ['a', 'x y'], ['a', '1']]);
 * // 'a=1&a=x%20y&b=2'
 * ```
 */
export const normalizeParameters = (params: readonly Parameter[]): string => {
  const seen = new Set<string>();
  const pairs: (readonly [string, string])[] = [];

  for (const [key, value] of params) {
    const encodedKey = percentEncode(key);
    const encodedValue = percentEncode(value);
    const pair = `${encodedKey}=${encodedValue}`;
    if (!seen.has(pair)) {
      seen.add(pair);
      pairs.push([encodedKey, encodedValue]);
    }
  }

  pairs.sort((a, b) => compare(a[0], b[0]) || compare(a[1], b[1]));

  return pairs.map(([key, value]) => `${key}=${value}`).join('&');
};

/**
 * Encodes parameters as an `application/x-www-form-urlencoded` body, keeping their order.
 */
export const encodeFormBody = (params: readonly Parameter[]): string =>
  params.map(([key, value]) => `${percentEncode(key)}=${percentEncode(value)}`).join('&');
