/**
 * Client options from environment variables.
 *
 * Variables:
 * - `CONSUMER_KEY`, `CONSUMER_SECRET`, `CALLBACK_URL` (OAuth1)
 * - `CLIENT_ID`, `CLIENT_SECRET`, `REDIRECT_URL`, `SCOPES` (OAuth2; scopes space separated)
 * - `OAUTH_TRY_COUNT`, `OAUTH_RETRY_DELAY_MS`, `OAUTH_TIMEOUT_MS`
 * - `OAUTH_BASE_URL` (OAuth1 API base)
 *
 * Explicit options take precedence over the environment.
 *
 * @packageDocumentation
 */

import type { Result } from 'neverthrow';
import type { ConfigurationError } from '../errors/types.js';
import { ALL_X_SCOPES } from '../providers/x.js';
import {
  parseOAuth1Options,
  parseOAuth2Options,
  type OAuth1Options,
  type OAuth2Options,
  type ResolvedOAuth1Options,
  type ResolvedOAuth2Options,
} from './schemas.js';

/**
 * Environment variable map, e.g. `process.env`.
 */
export type Environment = Readonly<Record<string, string | undefined>>;

const readString = (env: Environment, name: string): string | undefined => {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
};

/** Unparseable values become NaN so the schema reports them */
const readNumber = (env: Environment, name: string): number | undefined => {
  const value = readString(env, name);
  return value === undefined ? undefined : Number(value);
};

const readScopes = (env: Environment): readonly string[] => {
  const value = readString(env, 'SCOPES');
  if (value === undefined) {
    return ALL_X_SCOPES;
  }
  return value.split(/\s+/).filter((scope) => scope !== '');
};

/** Drops keys set to `undefined` so they do not mask environment values */
const definedEntries = (value: object): Record<string, unknown> =>
  Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));

/**
 * Loads OAuth1 options from the environment.
 *
 * @example
 * ```typescript
 * const options = loadOAuth1OptionsFromEnv(process.env, { callbackUrl: 'oob' });
 * if (options.isErr()) {
 *   console.error(options.error.message);
 * }
 * ```
 */
export const loadOAuth1OptionsFromEnv = (
  env: Environment = process.env,
  overrides: Partial<OAuth1Options> = {}
): Result<ResolvedOAuth1Options, ConfigurationError> =>
  parseOAuth1Options({
    consumerKey: readString(env, 'CONSUMER_KEY'),
    consumerSecret: readString(env, 'CONSUMER_SECRET'),
    callbackUrl: readString(env, 'CALLBACK_URL'),
    tryCount: readNumber(env, 'OAUTH_TRY_COUNT'),
    retryDelayMs: readNumber(env, 'OAUTH_RETRY_DELAY_MS'),
    timeoutMs: readNumber(env, 'OAUTH_TIMEOUT_MS'),
    baseUrl: readString(env, 'OAUTH_BASE_URL'),
    ...definedEntries(overrides),
  });

/**
 * Loads OAuth2 options from the environment. Without `SCOPES`, every X scope is requested.
 */
export const loadOAuth2OptionsFromEnv = (
  env: Environment = process.env,
  overrides: Partial<OAuth2Options> = {}
): Result<ResolvedOAuth2Options, ConfigurationError> =>
  parseOAuth2Options({
    clientId: readString(env, 'CLIENT_ID'),
    clientSecret: readString(env, 'CLIENT_SECRET'),
    redirectUri: readString(env, 'REDIRECT_URL'),
    scopes: readScopes(env),
    tryCount: readNumber(env, 'OAUTH_TRY_COUNT'),
    retryDelayMs: readNumber(env, 'OAUTH_RETRY_DELAY_MS'),
    timeoutMs: readNumber(env, 'OAUTH_TIMEOUT_MS'),
    ...definedEntries(overrides),
  });
