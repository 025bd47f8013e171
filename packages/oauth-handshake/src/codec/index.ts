export { percentEncode, normalizeParameters, encodeFormBody } from './percent-encoding.js';
export type { Parameter } from './percent-encoding.js';
export { ResponseType, CodeChallengeMethod, buildQueryString, appendQuery } from './query.js';
export type { QueryParameter } from './query.js';
export { parseFormBody } from './form-body.js';
