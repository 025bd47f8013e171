/**
 * PKCE (Proof Key for Code Exchange) implementation per RFC 7636.
 *
 * Only the S256 method is generated.
 *
 * @packageDocumentation
 */

import { createHash, randomBytes } from 'node:crypto';
import { err, ok, type Result } from 'neverthrow';
import { CodeChallengeMethod } from '../codec/query.js';
import type { PkceError } from '../errors/types.js';
import type { PkceChallenge } from './types.js';

/**
 * Characters allowed in PKCE verifier (unreserved URI characters).
 * Per RFC 7636 Section 4.1: [A-Z] / [a-z] / [0-9] / "-" / "." / "_" / "~"
 */
const VERIFIER_CHARSET = /^[A-Za-z0-9\-._~]*$/;

/**
 * Minimum length for PKCE verifier (RFC 7636 Section 4.1).
 */
export const VERIFIER_MIN_LENGTH = 43;

/**
 * Maximum length for PKCE verifier (RFC 7636 Section 4.1).
 */
export const VERIFIER_MAX_LENGTH = 128;

/**
 * Random bytes drawn for a verifier. 32 bytes base64url-encode to 43 characters,
 * 96 bytes to 128.
 */
const VERIFIER_DEFAULT_BYTES = 32;
const VERIFIER_MIN_BYTES = 32;
const VERIFIER_MAX_BYTES = 96;

/**
 * Creates a SHA-256 hash of the input's ASCII bytes as an unpadded base64url string.
 */
const sha256Base64Url = (input: string): string =>
  createHash('sha256').update(input, 'ascii').digest('base64url');

/**
 * Generates a cryptographically secure PKCE verifier.
 *
 * @param byteLength - Random bytes to draw (default: 32, clamped to 32-96)
 * @returns An unpadded base64url string of 43-128 characters
 *
 * @example
 * ```typescript
 * const verifier = generatePkceVerifier();
 * // => "dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk"
 * ```
 */
export const generatePkceVerifier = (byteLength: number = VERIFIER_DEFAULT_BYTES): string => {
  const clamped = Math.max(VERIFIER_MIN_BYTES, Math.min(VERIFIER_MAX_BYTES, Math.floor(byteLength)));
  return randomBytes(clamped).toString('base64url');
};

/**
 * Creates a PKCE challenge from a verifier using the S256 method.
 *
 * @param verifier - The PKCE verifier string
 * @returns Result with PkceChallenge or error
 *
 * @example
 * ```typescript
 * const result = createPkceChallenge(verifier);
 *
 * if (result.isOk()) {
 *   const { challenge, method } = result.value;
 * }
 * ```
 */
export const createPkceChallenge = (verifier: string): Result<PkceChallenge, PkceError> => {
  if (verifier.length < VERIFIER_MIN_LENGTH) {
    return err({
      code: 'pkce_error',
      message: `PKCE verifier must be at least ${String(VERIFIER_MIN_LENGTH)} characters`,
    });
  }

  if (verifier.length > VERIFIER_MAX_LENGTH) {
    return err({
      code: 'pkce_error',
      message: `PKCE verifier must be at most ${String(VERIFIER_MAX_LENGTH)} characters`,
    });
  }

  if (!VERIFIER_CHARSET.test(verifier)) {
    const invalidChars = [...new Set(verifier.split('').filter((char) => !VERIFIER_CHARSET.test(char)))];
    return err({
      code: 'pkce_error',
      message: `PKCE verifier contains invalid characters: ${invalidChars.join(', ')}`,
    });
  }

  return ok({
    verifier,
    challenge: sha256Base64Url(verifier),
    method: CodeChallengeMethod.S256,
  });
};

/**
 * Generates a fresh verifier/challenge pair. Call once per authorization attempt.
 *
 * @example
 * ```typescript
 * const { verifier, challenge } = generatePkcePair();
 * // keep `verifier` until the token exchange, send `challenge` in the authorize URL
 * ```
 */
export const generatePkcePair = (): PkceChallenge => {
  const verifier = generatePkceVerifier();
  return {
    verifier,
    challenge: sha256Base64Url(verifier),
    method: CodeChallengeMethod.S256,
  };
};

/**
 * Validates that a verifier matches a challenge.
 *
 * @returns true if the verifier produces the given challenge
 */
export const validatePkceChallenge = (verifier: string, challenge: string): boolean =>
  sha256Base64Url(verifier) === challenge;
