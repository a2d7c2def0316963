// src/core/auth/types.ts

export const TWITTER_AUTHORIZATION_ENDPOINT = 'https://twitter.com/i/oauth2/authorize';
export const TWITTER_TOKEN_ENDPOINT = 'https://api.twitter.com/2/oauth2/token';

/** Read access to bookmarks, plus a refresh token */
export const TWITTER_SCOPES = ['tweet.read', 'users.read', 'bookmark.read', 'offline.access'];

export interface OAuth2Config {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scopes?: string[];
  authorizationEndpoint?: string;
  tokenEndpoint?: string;
}

export interface AuthorizationRequest {
  url: string;
  state: string;
}

export interface PKCEChallenge {
  codeVerifier: string;
  codeChallenge: string;
  method: 'S256';
}

export interface TokenSet {
  accessToken: string;
  refreshToken?: string;
  expiresAt?: Date;
  scope?: string;
  tokenType?: string;
}
