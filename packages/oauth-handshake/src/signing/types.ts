import type { Parameter } from '../codec/percent-encoding.js';

/**
 * Everything needed to sign one OAuth1 request.
 */
export interface OAuth1SigningInput {
  readonly consumerKey: string;
  readonly consumerSecret: string;
  /** Token secret from a previous leg; omitted for the request-token call */
  readonly tokenSecret?: string | undefined;
  /** HTTP method; upper-cased in the base string */
  readonly method: string;
  /** Request URL without query string */
  readonly url: string;
  /** Extra protocol parameters, e.g. `oauth_callback`, `oauth_token`, `oauth_verifier` */
  readonly oauthParameters?: readonly Parameter[];
  /** Form or query parameters that take part in the signature but not the header */
  readonly bodyParameters?: readonly Parameter[];
  /** Fixed nonce; a random one is drawn when omitted */
  readonly nonce?: string | undefined;
  /** Fixed epoch seconds; the current time is used when omitted */
  readonly timestamp?: number | undefined;
}

/**
 * Result of signing a request.
 */
export interface SignedOAuth1Request {
  /** The string that was signed */
  readonly baseString: string;
  /** Base64 HMAC digest */
  readonly signature: string;
  /** Protocol parameters placed in the header, including `oauth_signature` */
  readonly parameters: readonly Parameter[];
  /** Value for the `Authorization` header, starting with `OAuth ` */
  readonly authorizationHeader: string;
}
