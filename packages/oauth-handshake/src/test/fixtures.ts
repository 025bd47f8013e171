/**
 * Shared test fixtures and constants.
 */

import type { HttpResponse } from '../http/types.js';
import type { RetryPolicy } from '../retry/types.js';

// ============================================================================
// URL Constants
// ============================================================================

export const TEST_BASE_URL = 'https://api.example.com';
export const TEST_REQUEST_TOKEN_URL = `${TEST_BASE_URL}/oauth/request_token`;
export const TEST_ACCESS_TOKEN_URL = `${TEST_BASE_URL}/oauth/access_token`;
export const TEST_OAUTH1_AUTHORIZE_URL = `${TEST_BASE_URL}/oauth/authorize`;
export const TEST_OAUTH2_AUTHORIZE_URL = 'https://example.com/i/oauth2/authorize';
export const TEST_TOKEN_URL = `${TEST_BASE_URL}/2/oauth2/token`;
export const TEST_CALLBACK_URL = 'http://localhost:8000/callback';

// ============================================================================
// Credentials
// ============================================================================

export const TEST_CONSUMER_KEY = 'test-consumer-key';
export const TEST_CONSUMER_SECRET = 'test-consumer-secret';
export const TEST_TOKEN_SECRET = 'test-token-secret';
export const TEST_CLIENT_ID = 'test-client-id';
export const TEST_CLIENT_SECRET = 'test-client-secret';

// ============================================================================
// Retry
// ============================================================================

/** Policy with a zero backoff unit so tests never wait */
export const FAST_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 0,
  timeoutMs: 1_000,
};

// ============================================================================
// Response Factories
// ============================================================================

/**
 * Creates an HTTP response with sensible defaults.
 */
export const createResponse = (
  status: number,
  body = '',
  headers: Readonly<Record<string, string>> = {}
): HttpResponse => ({
  status,
  statusText: '',
  headers,
  body,
});

/**
 * Form-encoded request token body.
 */
export const requestTokenBody = (token = 'request-token', secret = 'request-secret'): string =>
  `oauth_token=${token}&oauth_token_secret=${secret}&oauth_callback_confirmed=true`;

/**
 * Form-encoded access token body.
 */
export const accessTokenBody = (
  token = 'access-token',
  secret = 'access-secret',
  userId = '12345',
  screenName = 'example_user'
): string =>
  `oauth_token=${token}&oauth_token_secret=${secret}&user_id=${userId}&screen_name=${screenName}`;

/**
 * JSON OAuth2 token response body.
 */
export const tokenResponseBody = (overrides: Readonly<Record<string, unknown>> = {}): string =>
  JSON.stringify({
    token_type: 'bearer',
    expires_in: 7200,
    access_token: 'test-access-token',
    scope: 'tweet.read users.read',
    refresh_token: 'test-refresh-token',
    ...overrides,
  });
