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
} from './types.js';
export {
  createClientError,
  createRetriesExhaustedError,
  createTransportError,
  createMalformedResponseError,
  createConfigurationError,
  createCancelledError,
  isPermanentError,
} from './errors.js';
