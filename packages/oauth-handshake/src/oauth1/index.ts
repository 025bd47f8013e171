export { createOAuth1Client, decodeOAuth1Body } from './client.js';
export type {
  RequestToken,
  AccessToken,
  OAuth1ClientDeps,
  OAuth1Client,
} from './types.js';
