/**
 * X (formerly Twitter) endpoint presets and OAuth 2.0 scopes.
 *
 * These are the option defaults of the OAuth1 and OAuth2 clients. Pass
 * `baseUrl`, `authorizeUrl` or `tokenUrl` to point a client elsewhere.
 *
 * @packageDocumentation
 */

/**
 * OAuth 1.0a endpoints.
 */
export const X_OAUTH1_ENDPOINTS = {
  baseUrl: 'https://api.x.com',
  requestTokenPath: '/oauth/request_token',
  accessTokenPath: '/oauth/access_token',
  authorizeUrl: 'https://api.x.com/oauth/authorize',
} as const;

/**
 * OAuth 2.0 endpoints.
 */
export const X_OAUTH2_ENDPOINTS = {
  authorizeUrl: 'https://x.com/i/oauth2/authorize',
  tokenUrl: 'https://api.x.com/2/oauth2/token',
} as const;

/**
 * OAuth 2.0 scopes X grants.
 */
export const X_SCOPES = {
  TweetRead: 'tweet.read',
  TweetWrite: 'tweet.write',
  TweetModerateWrite: 'tweet.moderate.write',
  UsersEmail: 'users.email',
  UsersRead: 'users.read',
  FollowsRead: 'follows.read',
  FollowsWrite: 'follows.write',
  OfflineAccess: 'offline.access',
  SpaceRead: 'space.read',
  MuteRead: 'mute.read',
  MuteWrite: 'mute.write',
  LikeRead: 'like.read',
  LikeWrite: 'like.write',
  ListRead: 'list.read',
  ListWrite: 'list.write',
  BlockRead: 'block.read',
  BlockWrite: 'block.write',
  BookmarkRead: 'bookmark.read',
  BookmarkWrite: 'bookmark.write',
  DmRead: 'dm.read',
  DmWrite: 'dm.write',
  MediaWrite: 'media.write',
} as const;

export type XScope = (typeof X_SCOPES)[keyof typeof X_SCOPES];

/**
 * Every X scope, in declaration order.
 */
export const ALL_X_SCOPES: readonly XScope[] = Object.values(X_SCOPES);

/**
 * Joins scopes with single spaces, the form the `scope` query parameter takes.
 *
 * @example
 * ```typescript
 * scopesToString([X_SCOPES.TweetRead, X_SCOPES.UsersRead]); // 'tweet.read users.read'
 * ```
 */
export const scopesToString = (scopes: readonly string[]): string => scopes.join(' ');

/**
 * Value of `x_auth_access_type` on the request-token call.
 */
export const AccessType = {
  Read: 'read',
  Write: 'write',
} as const;

export type AccessType = (typeof AccessType)[keyof typeof AccessType];
