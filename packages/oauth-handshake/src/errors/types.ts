/**
 * Error taxonomy shared by the signing, exchange and flow modules.
 *
 * Errors are plain readonly objects carried in `neverthrow` results,
 * discriminated on `code`.
 *
 * @packageDocumentation
 */

/**
 * Response headers as a plain lowercase-keyed record.
 */
export type ResponseHeaders = Readonly<Record<string, string>>;

/**
 * Error codes surfaced to callers.
 */
export type OAuthErrorCode =
  | 'transport_error'
  | 'client_error'
  | 'retries_exhausted'
  | 'malformed_response'
  | 'configuration_error'
  | 'pkce_error'
  | 'cancelled';

/**
 * Connection, DNS or timeout failure reported by the transport on the final attempt.
 */
export interface TransportError {
  readonly code: 'transport_error';
  readonly message: string;
  /** Whether the attempt was cut off by the per-attempt timeout */
  readonly timedOut: boolean;
  /** Number of attempts made */
  readonly attempts: number;
  readonly cause?: unknown;
}

/**
 * 4xx response. Never retried.
 */
export interface ClientError {
  readonly code: 'client_error';
  readonly message: string;
  readonly body: string;
  readonly status: number;
  readonly headers: ResponseHeaders;
}

/**
 * The last attempt was still transient after the attempt budget ran out.
 */
export interface RetriesExhaustedError {
  readonly code: 'retries_exhausted';
  readonly message: string;
  readonly body: string;
  readonly status: number;
  readonly headers: ResponseHeaders;
  readonly attempts: number;
}

/**
 * Success status, but the body lacks the fields the flow needs.
 */
export interface MalformedResponseError {
  readonly code: 'malformed_response';
  readonly message: string;
  readonly body: string;
  readonly status: number;
  /** Keys that were expected but absent */
  readonly missing: readonly string[];
  readonly cause?: unknown;
}

/**
 * Missing or invalid options given to a client factory.
 */
export interface ConfigurationError {
  readonly code: 'configuration_error';
  readonly message: string;
  /** One entry per offending option, formatted as `path: reason` */
  readonly issues: readonly string[];
}

/**
 * Verifier outside the accepted length or alphabet.
 */
export interface PkceError {
  readonly code: 'pkce_error';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * The caller aborted the operation.
 */
export interface CancelledError {
  readonly code: 'cancelled';
  readonly message: string;
  /** Number of attempts started before the abort */
  readonly attempts: number;
  readonly cause?: unknown;
}

/**
 * Errors produced by a request/response exchange.
 */
export type ExchangeError =
  | TransportError
  | ClientError
  | RetriesExhaustedError
  | MalformedResponseError
  | CancelledError;

/**
 * Every error the library returns.
 */
export type OAuthError = ExchangeError | ConfigurationError | PkceError;
