/**
 * oauth-handshake - OAuth 1.0a and OAuth 2.0 (PKCE) client handshakes
 *
 * @packageDocumentation
 */

// ============================================================================
// CORE: OAuth 1.0a three-legged flow
// ============================================================================

export { createOAuth1Client, decodeOAuth1Body } from './oauth1/index.js';
export type {
  RequestToken,
  AccessToken,
  OAuth1ClientDeps,
  OAuth1Client,
} from './oauth1/index.js';

// ============================================================================
// CORE: OAuth 2.0 authorization code with PKCE
// ============================================================================

export {
  createOAuth2Client,
  decodeTokenResponse,
  basicAuthorization,
  TokenResultSchema,
} from './oauth2/index.js';
export type { TokenResult, AuthorizeUrl, OAuth2ClientDeps, OAuth2Client } from './oauth2/index.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  DEFAULT_TRY_COUNT,
  DEFAULT_OAUTH1_RETRY_DELAY_MS,
  DEFAULT_OAUTH2_RETRY_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
  MAX_TRY_COUNT,
  MAX_RETRY_DELAY_MS,
  MAX_TIMEOUT_MS,
  OAuth1OptionsSchema,
  OAuth2OptionsSchema,
  parseOAuth1Options,
  parseOAuth2Options,
  loadOAuth1OptionsFromEnv,
  loadOAuth2OptionsFromEnv,
} from './config/index.js';
export type {
  OAuth1Options,
  ResolvedOAuth1Options,
  OAuth2Options,
  ResolvedOAuth2Options,
  Environment,
} from './config/index.js';

// ============================================================================
// Providers
// ============================================================================

export {
  X_OAUTH1_ENDPOINTS,
  X_OAUTH2_ENDPOINTS,
  X_SCOPES,
  ALL_X_SCOPES,
  scopesToString,
  AccessType,
} from './providers/index.js';
export type { XScope } from './providers/index.js';

// ============================================================================
// Building blocks
// ============================================================================

export {
  SIGNATURE_METHOD,
  OAUTH_VERSION,
  generateNonce,
  currentTimestamp,
  createSigningKey,
  normalizeBaseStringUri,
  createSignatureBaseString,
  computeSignature,
  formatAuthorizationHeader,
  signOAuth1Request,
} from './signing/index.js';
export type { OAuth1SigningInput, SignedOAuth1Request } from './signing/index.js';

export {
  VERIFIER_MIN_LENGTH,
  VERIFIER_MAX_LENGTH,
  generatePkceVerifier,
  createPkceChallenge,
  generatePkcePair,
  validatePkceChallenge,
} from './pkce/index.js';
export type { PkceChallenge, PkceChallengeMethod } from './pkce/index.js';

export { MAX_BACKOFF_MS, classifyStatus, computeBackoffMs, createRetryExecutor } from './retry/index.js';
export type {
  RetryPolicy,
  RetryExecutorDeps,
  RequestBuilder,
  ResponseDecoder,
  StatusClass,
  ExchangeSuccess,
  ExecuteOptions,
  RetryExecutor,
} from './retry/index.js';

export {
  percentEncode,
  normalizeParameters,
  encodeFormBody,
  ResponseType,
  CodeChallengeMethod,
  buildQueryString,
  appendQuery,
  parseFormBody,
} from './codec/index.js';
export type { Parameter, QueryParameter } from './codec/index.js';

// ============================================================================
// Transport
// ============================================================================

export { createFetchTransport } from './http/index.js';
export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpError,
  SendOptions,
  HttpTransport,
  FetchTransportOptions,
} from './http/index.js';

// ============================================================================
// Errors and logging
// ============================================================================

export {
  createClientError,
  createRetriesExhaustedError,
  createTransportError,
  createMalformedResponseError,
  createConfigurationError,
  createCancelledError,
  isPermanentError,
} from './errors/index.js';
export type {
  ResponseHeaders,
  OAuthErrorCode,
  TransportError,
  ClientError,
  RetriesExhaustedError,
  MalformedResponseError,
  ConfigurationError,
  PkceError,
  CancelledError,
  ExchangeError,
  OAuthError,
} from './errors/index.js';

export { noopLogger, createConsoleLogger, createMemoryLogger } from './logging/index.js';
export type {
  LogLevel,
  LogContext,
  Logger,
  LogEntry,
  ConsoleLoggerOptions,
  MemoryLogger,
} from './logging/index.js';
