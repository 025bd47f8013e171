import type { Result } from 'neverthrow';
import type { z } from 'zod';
import type { ExchangeError } from '../errors/types.js';
import type { HttpTransport } from '../http/types.js';
import type { Logger } from '../logging/logger.js';
import type { ExchangeSuccess, ExecuteOptions } from '../retry/types.js';
import type { ResolvedOAuth2Options } from '../config/schemas.js';
import type { TokenResultSchema } from './client.js';

/**
 * Token endpoint response. `refresh_token` is only issued with `offline.access`.
 */
export type TokenResult = z.infer<typeof TokenResultSchema>;

/**
 * Authorize URL and the verifier to keep for the token exchange.
 */
export interface AuthorizeUrl {
  readonly url: string;
  /** Send back unchanged to `token`; never reuse */
  readonly codeVerifier: string;
}

/**
 * Collaborators of the OAuth2 client.
 */
export interface OAuth2ClientDeps {
  /** Defaults to a fetch transport */
  readonly transport?: HttpTransport;
  readonly logger?: Logger;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  readonly random?: () => number;
}

/**
 * OAuth 2.0 authorization-code client with PKCE.
 */
export interface OAuth2Client {
  /** Options with defaults applied */
  readonly options: ResolvedOAuth2Options;
  /**
   * Builds the authorize URL with a fresh PKCE pair.
   *
   * @param state - Opaque CSRF value the caller checks on the callback
   */
  readonly authorizeUrl: (state: string) => AuthorizeUrl;
  /**
   * Exchanges an authorization code for tokens.
   */
  readonly token: (
    code: string,
    codeVerifier: string,
    options?: ExecuteOptions
  ) => Promise<Result<ExchangeSuccess<TokenResult>, ExchangeError>>;
}
