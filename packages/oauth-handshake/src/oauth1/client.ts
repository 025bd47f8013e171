/**
 * OAuth 1.0a three-legged flow.
 *
 * `Start → RequestTokenIssued → (user authorizes) → AccessTokenIssued`
 *
 * Each exchange runs through the retry executor and every attempt is signed
 * with a fresh nonce and timestamp.
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import { parseFormBody } from '../codec/form-body.js';
import type { Parameter } from '../codec/percent-encoding.js';
import { appendQuery } from '../codec/query.js';
import { parseOAuth1Options, type OAuth1Options } from '../config/schemas.js';
import { createMalformedResponseError } from '../errors/errors.js';
import type { ConfigurationError, MalformedResponseError } from '../errors/types.js';
import { createFetchTransport } from '../http/fetch-client.js';
import type { HttpResponse } from '../http/types.js';
import { noopLogger } from '../logging/logger.js';
import { X_OAUTH1_ENDPOINTS } from '../providers/x.js';
import { createRetryExecutor } from '../retry/executor.js';
import type { RequestBuilder } from '../retry/types.js';
import { signOAuth1Request } from '../signing/oauth1-signature.js';
import type { AccessToken, OAuth1Client, OAuth1ClientDeps, RequestToken } from './types.js';

/**
 * Parses a form-encoded token body and checks that `required` keys are present.
 */
export const decodeOAuth1Body = (
  response: HttpResponse,
  required: readonly string[]
): Result<ReadonlyMap<string, string>, MalformedResponseError> => {
  const fields = parseFormBody(response.body);
  const missing = required.filter((key) => !fields.has(key));
  if (missing.length > 0) {
    return err(
      createMalformedResponseError(
        `Response is missing ${missing.join(', ')}`,
        response.body,
        response.status,
        missing
      )
    );
  }
  return ok(fields);
};

/**
 * Creates an OAuth 1.0a client.
 *
 * Options are validated before anything is sent; invalid options yield a
 * configuration error.
 *
 * @example
 * ```typescript
 * const client = createOAuth1Client({
 *   consumerKey: process.env['CONSUMER_KEY'] ?? '',
 *   consumerSecret: process.env['CONSUMER_SECRET'] ?? '',
 *   callbackUrl: 'http://localhost:3000/callback',
 * });
 *
 * if (client.isOk()) {
 *   const requestToken = await client.value.requestToken(AccessType.Read);
 *   if (requestToken.isOk()) {
 *     // redirect the user to requestToken.value.value.url
 *   }
 * }
 * ```
 */
export const createOAuth1Client = (
  options: OAuth1Options,
  deps: OAuth1ClientDeps = {}
): Result<OAuth1Client, ConfigurationError> => {
  const parsed = parseOAuth1Options(options);
  if (parsed.isErr()) {
    return err(parsed.error);
  }
  const config = parsed.value;

  const logger = (deps.logger ?? noopLogger).child({ flow: 'oauth1' });
  const executor = createRetryExecutor(
    { maxAttempts: config.tryCount, baseDelayMs: config.retryDelayMs, timeoutMs: config.timeoutMs },
    {
      transport: deps.transport ?? createFetchTransport({ timeoutMs: config.timeoutMs }),
      logger,
      sleep: deps.sleep,
      random: deps.random,
    }
  );

  const requestTokenUrl = `${config.baseUrl}${X_OAUTH1_ENDPOINTS.requestTokenPath}`;
  const accessTokenUrl = `${config.baseUrl}${X_OAUTH1_ENDPOINTS.accessTokenPath}`;

  const signedPost =
    (url: string, oauthParameters: readonly Parameter[], tokenSecret?: string): RequestBuilder =>
    () => {
      const signed = signOAuth1Request({
        consumerKey: config.consumerKey,
        consumerSecret: config.consumerSecret,
        tokenSecret,
        method: 'POST',
        url,
        oauthParameters,
        nonce: deps.nonce?.(),
        timestamp: deps.clock?.(),
      });
      return { url, method: 'POST', headers: { Authorization: signed.authorizationHeader } };
    };

  const createAuthorizeUrl = (oauthToken: string): string =>
    appendQuery(config.authorizeUrl, [['oauth_token', oauthToken]]);

  const requestToken: OAuth1Client['requestToken'] = async (accessType, operation = {}) => {
    const oauthParameters: Parameter[] = [['oauth_callback', config.callbackUrl]];
    if (accessType !== undefined) {
      oauthParameters.push(['x_auth_access_type', accessType]);
    }
    logger.info('Requesting request token', { url: requestTokenUrl, accessType });

    const result = await executor.execute(
      signedPost(requestTokenUrl, oauthParameters),
      (response) =>
        decodeOAuth1Body(response, [
          'oauth_token',
          'oauth_token_secret',
          'oauth_callback_confirmed',
        ]).map(
          (fields): RequestToken => {
            const oauthToken = fields.get('oauth_token') ?? '';
            return {
              oauthToken,
              oauthTokenSecret: fields.get('oauth_token_secret') ?? '',
              oauthCallbackConfirmed: fields.get('oauth_callback_confirmed') === 'true',
              url: createAuthorizeUrl(oauthToken),
              raw: response.body,
            };
          }
        ),
      { signal: operation.signal }
    );

    if (result.isOk()) {
      logger.info('Request token issued', { attempts: result.value.attempts });
    } else {
      logger.warn('Request token failed', { code: result.error.code });
    }
    return result;
  };

  const accessToken: OAuth1Client['accessToken'] = async (
    oauthToken,
    oauthTokenSecret,
    oauthVerifier,
    operation = {}
  ) => {
    logger.info('Exchanging verifier for access token', { url: accessTokenUrl });

    const result = await executor.execute(
      signedPost(
        accessTokenUrl,
        [
          ['oauth_token', oauthToken],
          ['oauth_verifier', oauthVerifier],
        ],
        oauthTokenSecret
      ),
      (response) =>
        decodeOAuth1Body(response, ['oauth_token', 'oauth_token_secret', 'screen_name']).map(
          (fields): AccessToken => {
            const userId = fields.get('user_id');
            return {
              oauthToken: fields.get('oauth_token') ?? '',
              oauthTokenSecret: fields.get('oauth_token_secret') ?? '',
              screenName: fields.get('screen_name') ?? '',
              ...(userId !== undefined ? { userId } : {}),
              raw: response.body,
            };
          }
        ),
      { signal: operation.signal }
    );

    if (result.isOk()) {
      logger.info('Access token issued', { attempts: result.value.attempts });
    } else {
      logger.warn('Access token failed', { code: result.error.code });
    }
    return result;
  };

  return ok({
    options: config,
    requestToken,
    accessToken,
    createAuthorizeUrl,
  });
};
