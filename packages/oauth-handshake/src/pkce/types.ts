/**
 * PKCE challenge method generated by this library.
 */
export type PkceChallengeMethod = 'S256';

/**
 * PKCE verifier/challenge pair.
 */
export interface PkceChallenge {
  /** The code verifier (random string, 43-128 chars); kept by the caller until token exchange */
  readonly verifier: string;
  /** The code challenge (base64url-encoded SHA-256 hash of verifier) */
  readonly challenge: string;
  readonly method: PkceChallengeMethod;
}
