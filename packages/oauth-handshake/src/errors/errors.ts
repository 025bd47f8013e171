import type {
  CancelledError,
  ClientError,
  ConfigurationError,
  MalformedResponseError,
  OAuthError,
  ResponseHeaders,
  RetriesExhaustedError,
  TransportError,
} from './types.js';

/**
 * Creates a client error for a 4xx response.
 */
export const createClientError = (
  body: string,
  status: number,
  headers: ResponseHeaders
): ClientError => ({
  code: 'client_error',
  message: `Request rejected with HTTP ${String(status)}`,
  body,
  status,
  headers,
});

/**
 * Creates the terminal error returned when every attempt was transient.
 */
export const createRetriesExhaustedError = (
  body: string,
  status: number,
  headers: ResponseHeaders,
  attempts: number
): RetriesExhaustedError => ({
  code: 'retries_exhausted',
  message: `Gave up after ${String(attempts)} attempts; last status HTTP ${String(status)}`,
  body,
  status,
  headers,
  attempts,
});

/**
 * Creates a transport error for a failed final attempt.
 */
export const createTransportError = (
  message: string,
  attempts: number,
  timedOut: boolean,
  cause?: unknown
): TransportError => ({
  code: 'transport_error',
  message,
  timedOut,
  attempts,
  cause,
});

/**
 * Creates a malformed-response error.
 *
 * @param missing - Keys the body was expected to carry
 */
export const createMalformedResponseError = (
  message: string,
  body: string,
  status: number,
  missing: readonly string[] = [],
  cause?: unknown
): MalformedResponseError => ({
  code: 'malformed_response',
  message,
  body,
  status,
  missing,
  cause,
});

/**
 * Creates a configuration error from a list of issues.
 */
export const createConfigurationError = (
  message: string,
  issues: readonly string[]
): ConfigurationError => ({
  code: 'configuration_error',
  message: issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
  issues,
});

/**
 * Creates the error returned when the caller aborts an operation.
 */
export const createCancelledError = (attempts: number, cause?: unknown): CancelledError => ({
  code: 'cancelled',
  message: 'Operation was cancelled',
  attempts,
  cause,
});

/**
 * Whether an error leaves the caller with nothing to retry.
 * Client, configuration, PKCE and malformed-response errors will fail the same way again.
 */
export const isPermanentError = (error: OAuthError): boolean => {
  switch (error.code) {
    case 'client_error':
    case 'configuration_error':
    case 'pkce_error':
    case 'malformed_response':
      return true;
    case 'transport_error':
    case 'retries_exhausted':
    case 'cancelled':
      return false;
  }
};
