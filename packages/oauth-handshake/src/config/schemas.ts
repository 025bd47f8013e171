/**
 * Client option schemas.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { err, ok, type Result } from 'neverthrow';
import { createConfigurationError } from '../errors/errors.js';
import type { ConfigurationError } from '../errors/types.js';
import { X_OAUTH1_ENDPOINTS, X_OAUTH2_ENDPOINTS } from '../providers/x.js';

/** Default attempts per exchange */
export const DEFAULT_TRY_COUNT = 3;

/** Default OAuth1 backoff unit in milliseconds */
export const DEFAULT_OAUTH1_RETRY_DELAY_MS = 100;

/** Default OAuth2 backoff unit in milliseconds */
export const DEFAULT_OAUTH2_RETRY_DELAY_MS = 500;

/** Default per-attempt timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 10_000;

/** Most attempts an exchange may be configured with */
export const MAX_TRY_COUNT = 10;

/** Largest backoff unit in milliseconds */
export const MAX_RETRY_DELAY_MS = 60_000;

/** Largest per-attempt timeout a Node timer can hold */
export const MAX_TIMEOUT_MS = 2_147_483_647;

const requiredString = z.string().min(1, 'must not be empty');

const endpointUrl = z
  .string()
  .url()
  .transform((url) => url.replace(/\/+$/, ''));

const retrySettings = (retryDelayMs: number) => ({
  tryCount: z
    .number()
    .int()
    .min(1)
    .max(MAX_TRY_COUNT, `must be at most ${MAX_TRY_COUNT}`)
    .default(DEFAULT_TRY_COUNT),
  retryDelayMs: z
    .number()
    .int()
    .min(0)
    .max(MAX_RETRY_DELAY_MS, `must be at most ${MAX_RETRY_DELAY_MS}`)
    .default(retryDelayMs),
  timeoutMs: z
    .number()
    .int()
    .positive()
    .max(MAX_TIMEOUT_MS, `must be at most ${MAX_TIMEOUT_MS}`)
    .default(DEFAULT_TIMEOUT_MS),
});

/**
 * OAuth 1.0a client options. `callbackUrl` may be `oob` for out-of-band PIN flows.
 */
export const OAuth1OptionsSchema = z.object({
  consumerKey: requiredString,
  consumerSecret: requiredString,
  callbackUrl: requiredString,
  ...retrySettings(DEFAULT_OAUTH1_RETRY_DELAY_MS),
  baseUrl: endpointUrl.default(X_OAUTH1_ENDPOINTS.baseUrl),
  authorizeUrl: endpointUrl.default(X_OAUTH1_ENDPOINTS.authorizeUrl),
});

/**
 * OAuth 2.0 authorization-code client options.
 */
export const OAuth2OptionsSchema = z.object({
  clientId: requiredString,
  clientSecret: requiredString,
  redirectUri: z.string().url(),
  scopes: z.array(requiredString).min(1, 'at least one scope is required').readonly(),
  ...retrySettings(DEFAULT_OAUTH2_RETRY_DELAY_MS),
  authorizeUrl: endpointUrl.default(X_OAUTH2_ENDPOINTS.authorizeUrl),
  tokenUrl: endpointUrl.default(X_OAUTH2_ENDPOINTS.tokenUrl),
});

/** Options accepted by `createOAuth1Client` */
export type OAuth1Options = z.input<typeof OAuth1OptionsSchema>;

/** OAuth1 options with every default filled in */
export type ResolvedOAuth1Options = z.output<typeof OAuth1OptionsSchema>;

/** Options accepted by `createOAuth2Client` */
export type OAuth2Options = z.input<typeof OAuth2OptionsSchema>;

/** OAuth2 options with every default filled in */
export type ResolvedOAuth2Options = z.output<typeof OAuth2OptionsSchema>;

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path === '' ? issue.message : `${path}: ${issue.message}`;
  });

/**
 * Validates OAuth1 options and fills in defaults.
 *
 * @example
 * ```typescript
 * const result = parseOAuth1Options({ consumerKey: '', consumerSecret: 's', callbackUrl: 'oob' });
 * // err: 'Invalid OAuth1 options: consumerKey: must not be empty'
 * ```
 */
export const parseOAuth1Options = (
  input: unknown
): Result<ResolvedOAuth1Options, ConfigurationError> => {
  const parsed = OAuth1OptionsSchema.safeParse(input);
  return parsed.success
    ? ok(parsed.data)
    : err(createConfigurationError('Invalid OAuth1 options', formatIssues(parsed.error)));
};

/**
 * Validates OAuth2 options and fills in defaults.
 */
export const parseOAuth2Options = (
  input: unknown
): Result<ResolvedOAuth2Options, ConfigurationError> => {
  const parsed = OAuth2OptionsSchema.safeParse(input);
  return parsed.success
    ? ok(parsed.data)
    : err(createConfigurationError('Invalid OAuth2 options', formatIssues(parsed.error)));
};
