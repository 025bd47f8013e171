/**
 * OAuth1 signature engine.
 *
 * @packageDocumentation
 */

export type { OAuth1SigningInput, SignedOAuth1Request } from './types.js';
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
} from './oauth1-signature.js';
