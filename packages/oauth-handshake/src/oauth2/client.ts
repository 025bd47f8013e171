/**
 * OAuth 2.0 authorization-code flow with PKCE (S256).
 *
 * @packageDocumentation
 */

import { Buffer } from 'node:buffer';
import { z } from 'zod';
import { err, ok, type Result } from 'neverthrow';
import { encodeFormBody } from '../codec/percent-encoding.js';
import { CodeChallengeMethod, ResponseType, appendQuery } from '../codec/query.js';
import { parseOAuth2Options, type OAuth2Options } from '../config/schemas.js';
import { createMalformedResponseError } from '../errors/errors.js';
import type { ConfigurationError, MalformedResponseError } from '../errors/types.js';
import { createFetchTransport } from '../http/fetch-client.js';
import type { HttpResponse } from '../http/types.js';
import { noopLogger } from '../logging/logger.js';
import { generatePkcePair } from '../pkce/pkce.js';
import { scopesToString } from '../providers/x.js';
import { createRetryExecutor } from '../retry/executor.js';
import type { AuthorizeUrl, OAuth2Client, OAuth2ClientDeps, TokenResult } from './types.js';

/**
 * Shape of a token endpoint response.
 */
export const TokenResultSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().optional(),
  expires_in: z.number().int().nonnegative(),
  scope: z.string(),
  token_type: z.string(),
});

/**
 * Decodes a JSON token response body.
 */
export const decodeTokenResponse = (
  response: HttpResponse
): Result<TokenResult, MalformedResponseError> => {
  let json: unknown;
  try {
    json = JSON.parse(response.body);
  } catch (error) {
    return err(
      createMalformedResponseError(
        'Token response is not valid JSON',
        response.body,
        response.status,
        [],
        error
      )
    );
  }

  const parsed = TokenResultSchema.safeParse(json);
  if (!parsed.success) {
    const missing = parsed.error.issues
      .filter((issue) => issue.code === 'invalid_type' && issue.received === 'undefined')
      .map((issue) => issue.path.join('.'));
    return err(
      createMalformedResponseError(
        'Token response has an unexpected shape',
        response.body,
        response.status,
        missing,
        parsed.error
      )
    );
  }
  return ok(parsed.data);
};

/**
 * `Basic` credentials for the token endpoint.
 */
export const basicAuthorization = (clientId: string, clientSecret: string): string =>
  `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString('base64')}`;

/**
 * Creates an OAuth 2.0 client.
 *
 * @example
 * ```typescript
 * const client = createOAuth2Client({
 *   clientId: 'my-client',
 *   clientSecret: 'my-secret',
 *   redirectUri: 'http://localhost:3000/callback',
 *   scopes: [X_SCOPES.TweetRead, X_SCOPES.UsersRead],
 * });
 *
 * if (client.isOk()) {
 *   const { url, codeVerifier } = client.value.authorizeUrl(state);
 *   // keep codeVerifier with the session, redirect to url
 *   const tokens = await client.value.token(codeFromCallback, codeVerifier);
 * }
 * ```
 */
export const createOAuth2Client = (
  options: OAuth2Options,
  deps: OAuth2ClientDeps = {}
): Result<OAuth2Client, ConfigurationError> => {
  const parsed = parseOAuth2Options(options);
  if (parsed.isErr()) {
    return err(parsed.error);
  }
  const config = parsed.value;

  const logger = (deps.logger ?? noopLogger).child({ flow: 'oauth2' });
  const executor = createRetryExecutor(
    { maxAttempts: config.tryCount, baseDelayMs: config.retryDelayMs, timeoutMs: config.timeoutMs },
    {
      transport: deps.transport ?? createFetchTransport({ timeoutMs: config.timeoutMs }),
      logger,
      sleep: deps.sleep,
      random: deps.random,
    }
  );
  const authorization = basicAuthorization(config.clientId, config.clientSecret);

  const authorizeUrl = (state: string): AuthorizeUrl => {
    const pkce = generatePkcePair();
    const url = appendQuery(config.authorizeUrl, [
      ['response_type', ResponseType.Code],
      ['client_id', config.clientId],
      ['redirect_uri', config.redirectUri],
      ['scope', scopesToString(config.scopes)],
      ['state', state],
      ['code_challenge', pkce.challenge],
      ['code_challenge_method', CodeChallengeMethod.S256],
    ]);
    logger.debug('Built authorize URL', { scopes: config.scopes.length });
    return { url, codeVerifier: pkce.verifier };
  };

  const token: OAuth2Client['token'] = async (code, codeVerifier, operation = {}) => {
    const body = encodeFormBody([
      ['grant_type', 'authorization_code'],
      ['code', code],
      ['redirect_uri', config.redirectUri],
      ['client_id', config.clientId],
      ['code_verifier', codeVerifier],
    ]);
    logger.info('Exchanging authorization code', { url: config.tokenUrl });

    const result = await executor.execute(
      () => ({
        url: config.tokenUrl,
        method: 'POST',
        headers: {
          Authorization: authorization,
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body,
      }),
      decodeTokenResponse,
      { signal: operation.signal }
    );

    if (result.isOk()) {
      logger.info('Token issued', {
        attempts: result.value.attempts,
        refreshable: result.value.value.refresh_token !== undefined,
      });
    } else {
      logger.warn('Token exchange failed', { code: result.error.code });
    }
    return result;
  };

  return ok({ options: config, authorizeUrl, token });
};
