export {
  DEFAULT_TRY_COUNT,
  DEFAULT_OAUTH1_RETRY_DELAY_MS,
  DEFAULT_OAUTH2_RETRY_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
  MAX_TRY_COUNT,
  MAX_RETRY_DELAY_MS,
  MAX_TIMEOUT_MS,
  OAuth1OptionsSchema,
  OAuth2OptionsSchema,
  parseOAuth1Options,
  parseOAuth2Options,
} from './schemas.js';
export type {
  OAuth1Options,
  ResolvedOAuth1Options,
  OAuth2Options,
  ResolvedOAuth2Options,
} from './schemas.js';
export { loadOAuth1OptionsFromEnv, loadOAuth2OptionsFromEnv } from './env.js';
export type { Environment } from './env.js';
