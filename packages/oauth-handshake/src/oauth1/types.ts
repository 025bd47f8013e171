import type { Result } from 'neverthrow';
import type { ExchangeError } from '../errors/types.js';
import type { HttpTransport } from '../http/types.js';
import type { Logger } from '../logging/logger.js';
import type { ExchangeSuccess, ExecuteOptions } from '../retry/types.js';
import type { ResolvedOAuth1Options } from '../config/schemas.js';
import type { AccessType } from '../providers/x.js';

/**
 * Temporary credentials from the request-token leg.
 *
 * Keep `oauthTokenSecret` until the access-token leg; it signs that request.
 */
export interface RequestToken {
  readonly oauthToken: string;
  readonly oauthTokenSecret: string;
  /** `oauth_callback_confirmed` was `true` */
  readonly oauthCallbackConfirmed: boolean;
  /** Where to send the user to authorize the token */
  readonly url: string;
  /** Response body as received */
  readonly raw: string;
}

/**
 * Token credentials from the access-token leg.
 */
export interface AccessToken {
  readonly oauthToken: string;
  readonly oauthTokenSecret: string;
  readonly screenName: string;
  /** `user_id`, when the provider sends one */
  readonly userId?: string;
  /** Response body as received */
  readonly raw: string;
}

/**
 * Collaborators of the OAuth1 client.
 */
export interface OAuth1ClientDeps {
  /** Defaults to a fetch transport */
  readonly transport?: HttpTransport;
  readonly logger?: Logger;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  readonly random?: () => number;
  /** Nonce source; fixed values make signatures reproducible in tests */
  readonly nonce?: () => string;
  /** Epoch seconds source */
  readonly clock?: () => number;
}

/**
 * OAuth 1.0a three-legged client.
 */
export interface OAuth1Client {
  /** Options with defaults applied */
  readonly options: ResolvedOAuth1Options;
  /**
   * Obtains a request token and its authorize URL.
   *
   * @param accessType - Sent as `x_auth_access_type` when given
   */
  readonly requestToken: (
    accessType?: AccessType,
    options?: ExecuteOptions
  ) => Promise<Result<ExchangeSuccess<RequestToken>, ExchangeError>>;
  /**
   * Exchanges an authorized request token and the callback's verifier for token credentials.
   */
  readonly accessToken: (
    oauthToken: string,
    oauthTokenSecret: string,
    oauthVerifier: string,
    options?: ExecuteOptions
  ) => Promise<Result<ExchangeSuccess<AccessToken>, ExchangeError>>;
  /** `<authorizeUrl>?oauth_token=<token>` */
  readonly createAuthorizeUrl: (oauthToken: string) => string;
}
