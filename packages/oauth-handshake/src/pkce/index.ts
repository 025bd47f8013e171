export type { PkceChallenge, PkceChallengeMethod } from './types.js';
export {
  VERIFIER_MIN_LENGTH,
  VERIFIER_MAX_LENGTH,
  generatePkceVerifier,
  createPkceChallenge,
  generatePkcePair,
  validatePkceChallenge,
} from './pkce.js';
