import { describe, it, expect } from 'vitest';
import { Buffer } from 'node:buffer';
import { createOAuth2Client, decodeTokenResponse, basicAuthorization } from './client.js';
import { validatePkceChallenge } from '../pkce/pkce.js';
import { createMemoryLogger } from '../logging/logger.js';
import {
  TEST_CALLBACK_URL,
  TEST_CLIENT_ID,
  TEST_CLIENT_SECRET,
  TEST_OAUTH2_AUTHORIZE_URL,
  TEST_TOKEN_URL,
  createResponse,
  tokenResponseBody,
} from '../test/fixtures.js';
import {
  createMockTransport,
  createRecordingSleep,
  fail,
  respond,
  type ScriptedOutcome,
} from '../test/mocks.js';

const OPTIONS = {
  clientId: TEST_CLIENT_ID,
  clientSecret: TEST_CLIENT_SECRET,
  redirectUri: TEST_CALLBACK_URL,
  scopes: ['tweet.read', 'users.read', 'offline.access'],
  authorizeUrl: TEST_OAUTH2_AUTHORIZE_URL,
  tokenUrl: TEST_TOKEN_URL,
};

const setup = (outcomes: readonly ScriptedOutcome[]) => {
  const transport = createMockTransport(outcomes);
  const recorder = createRecordingSleep();
  const logger = createMemoryLogger();
  const client = createOAuth2Client(OPTIONS, {
    transport,
    logger,
    sleep: recorder.sleep,
    random: () => 0,
  })._unsafeUnwrap();
  return { client, transport, recorder, logger };
};

describe('createOAuth2Client', () => {
  describe('given a redirect URI that is not a URL', () => {
    it('returns a configuration error', () => {
      // Act
      const result = createOAuth2Client({ ...OPTIONS, redirectUri: 'callback' });

      // Assert
      expect(result.isErr() && result.error.code).toBe('configuration_error');
    });
  });

  describe('authorizeUrl', () => {
    it('builds the query in order with a matching PKCE challenge', () => {
      // Arrange
      const { client } = setup([]);

      // Act
      const { url, codeVerifier } = client.authorizeUrl('state1');

      // Assert
      const parsed = new URL(url);
      expect(`${parsed.origin}${parsed.pathname}`).toBe(TEST_OAUTH2_AUTHORIZE_URL);
      expect([...parsed.searchParams.keys()]).toEqual([
        'response_type',
        'client_id',
        'redirect_uri',
        'scope',
        'state',
        'code_challenge',
        'code_challenge_method',
      ]);
      expect(parsed.searchParams.get('response_type')).toBe('code');
      expect(parsed.searchParams.get('client_id')).toBe(TEST_CLIENT_ID);
      expect(parsed.searchParams.get('redirect_uri')).toBe(TEST_CALLBACK_URL);
      expect(parsed.searchParams.get('scope')).toBe('tweet.read users.read offline.access');
      expect(parsed.searchParams.get('state')).toBe('state1');
      expect(parsed.searchParams.get('code_challenge_method')).toBe('S256');
      expect(url).toContain('&state=state1&');
      expect(url).toMatch(/&code_challenge_method=S256$/);
      expect(validatePkceChallenge(codeVerifier, parsed.searchParams.get('code_challenge') ?? '')).toBe(
        true
      );
    });

    it('percent-encodes spaces in the scope as %20', () => {
      // Arrange
      const { client } = setup([]);

      // Act
      const { url } = client.authorizeUrl('s');

      // Assert
      expect(url).toContain('&scope=tweet.read%20users.read%20offline.access&');
      expect(url).toContain('&redirect_uri=http%3A%2F%2Flocalhost%3A8000%2Fcallback&');
    });

    it('encodes a state holding a lone surrogate instead of throwing', () => {
      // Arrange
      const { client } = setup([]);

      // Act
      const { url } = client.authorizeUrl('s\uD800');

      // Assert
      expect(url).toContain('&state=s%EF%BF%BD&');
    });

    it('draws a fresh verifier for every call', () => {
      // Arrange
      const { client } = setup([]);

      // Act
      const first = client.authorizeUrl('state1');
      const second = client.authorizeUrl('state1');

      // Assert
      expect(first.codeVerifier).not.toBe(second.codeVerifier);
      expect(first.codeVerifier).toHaveLength(43);
    });
  });

  describe('token', () => {
    it('posts the form body with basic credentials and decodes the tokens', async () => {
      // Arrange
      const { client, transport } = setup([respond(200, tokenResponseBody())]);

      // Act
      const result = await client.token('auth-code', 'test-verifier');

      // Assert
      const request = transport.calls[0]?.request;
      expect(request?.url).toBe(TEST_TOKEN_URL);
      expect(request?.method).toBe('POST');
      expect(request?.body).toBe(
        'grant_type=authorization_code&code=auth-code' +
          '&redirect_uri=http%3A%2F%2Flocalhost%3A8000%2Fcallback' +
          `&client_id=${TEST_CLIENT_ID}&code_verifier=test-verifier`
      );
      expect(request?.headers?.['Authorization']).toBe(
        `Basic ${Buffer.from(`${TEST_CLIENT_ID}:${TEST_CLIENT_SECRET}`).toString('base64')}`
      );
      expect(request?.headers?.['Content-Type']).toBe('application/x-www-form-urlencoded');
      expect(result._unsafeUnwrap().value).toEqual({
        token_type: 'bearer',
        expires_in: 7200,
        access_token: 'test-access-token',
        scope: 'tweet.read users.read',
        refresh_token: 'test-refresh-token',
      });
    });

    it('accepts a response without a refresh token', async () => {
      // Arrange
      const { client } = setup([respond(200, tokenResponseBody({ refresh_token: undefined }))]);

      // Act
      const result = await client.token('auth-code', 'test-verifier');

      // Assert
      expect(result._unsafeUnwrap().value.refresh_token).toBeUndefined();
    });

    it('retries a 503 with the configured backoff', async () => {
      // Arrange
      const { client, transport, recorder } = setup([
        respond(503),
        fail('network'),
        respond(200, tokenResponseBody()),
      ]);

      // Act
      const result = await client.token('auth-code', 'test-verifier');

      // Assert
      expect(result.isOk()).toBe(true);
      expect(transport.calls).toHaveLength(3);
      expect(recorder.delays).toEqual([500, 1000]);
    });

    it('returns a client error for an invalid grant', async () => {
      // Arrange
      const { client } = setup([respond(400, '{"error":"invalid_request"}')]);

      // Act
      const result = await client.token('bad-code', 'test-verifier');

      // Assert
      if (result.isErr() && result.error.code === 'client_error') {
        expect(result.error.status).toBe(400);
        expect(result.error.body).toBe('{"error":"invalid_request"}');
      } else {
        expect.unreachable('expected client_error');
      }
    });

    it('never logs the client secret, code or verifier', async () => {
      // Arrange
      const { client, logger } = setup([respond(200, tokenResponseBody())]);

      // Act
      await client.token('auth-code', 'test-verifier');

      // Assert
      const logged = JSON.stringify(logger.entries);
      expect(logged).not.toContain(TEST_CLIENT_SECRET);
      expect(logged).not.toContain('auth-code');
      expect(logged).not.toContain('test-verifier');
    });
  });
});

describe('decodeTokenResponse', () => {
  it('decodeTokenResponse_InvalidJson_ReturnsMalformedResponse', () => {
    // Act
    const result = decodeTokenResponse(createResponse(200, '<html>'));

    // Assert
    const error = result._unsafeUnwrapErr();
    expect(error.code).toBe('malformed_response');
    expect(error.message).toBe('Token response is not valid JSON');
    expect(error.body).toBe('<html>');
  });

  it('decodeTokenResponse_MissingAccessToken_ListsTheKey', () => {
    // Act
    const result = decodeTokenResponse(
      createResponse(200, tokenResponseBody({ access_token: undefined }))
    );

    // Assert
    const error = result._unsafeUnwrapErr();
    expect(error.message).toBe('Token response has an unexpected shape');
    expect(error.missing).toEqual(['access_token']);
  });
});

describe('basicAuthorization', () => {
  it('basicAuthorization_Credentials_EncodesIdColonSecret', () => {
    // Act & Assert
    expect(basicAuthorization('id', 'secret')).toBe('Basic aWQ6c2VjcmV0');
  });
});
