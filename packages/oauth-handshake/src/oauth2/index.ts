export {
  createOAuth2Client,
  decodeTokenResponse,
  basicAuthorization,
  TokenResultSchema,
} from './client.js';
export type {
  TokenResult,
  AuthorizeUrl,
  OAuth2ClientDeps,
  OAuth2Client,
} from './types.js';
