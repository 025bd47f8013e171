export {
  X_OAUTH1_ENDPOINTS,
  X_OAUTH2_ENDPOINTS,
  X_SCOPES,
  ALL_X_SCOPES,
  scopesToString,
  AccessType,
} from './x.js';
export type { XScope } from './x.js';
