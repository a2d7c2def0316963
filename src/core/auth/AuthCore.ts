// src/core/auth/AuthCore.ts

import { Issuer, generators } from 'openid-client';
import type { Client, TokenSet as OidcTokenSet } from 'openid-client';
import {
  TWITTER_AUTHORIZATION_ENDPOINT,
  TWITTER_SCOPES,
  TWITTER_TOKEN_ENDPOINT,
} from './types';
import type { AuthorizationRequest, OAuth2Config, PKCEChallenge, TokenSet } from './types';
import type { Logger } from '../../observability/Logger';
import { OAuthError, toError } from '../../utils/errors';
import { withSpan } from '../../observability/tracing';

/**
 * OAuth 2.0 authorization code flow with PKCE for the Twitter (X) API.
 *
 * Challenges live in memory for ten minutes, which is enough for the
 * interactive `auth` command; they are swept whenever a new one is made.
 */
export class AuthCore {
  private readonly client: Client;
  private pkceStore: Map<string, PKCEChallenge & { createdAt: number }> = new Map();
  private readonly PKCE_TTL = 600000;

  constructor(
    private config: OAuth2Config,
    private logger: Logger,
    private now: () => number = Date.now
  ) {
    const issuer = new Issuer({
      issuer: 'twitter',
      authorization_endpoint: config.authorizationEndpoint ?? TWITTER_AUTHORIZATION_ENDPOINT,
      token_endpoint: config.tokenEndpoint ?? TWITTER_TOKEN_ENDPOINT,
      token_endpoint_auth_methods_supported: ['client_secret_basic'],
    });

    this.client = new issuer.Client({
      client_id: config.clientId,
      client_secret: config.clientSecret,
      redirect_uris: [config.redirectUri],
      response_types: ['code'],
      token_endpoint_auth_method: 'client_secret_basic',
    });
  }

  createAuthUrl(): AuthorizationRequest {
    this.cleanupExpiredChallenges();

    const state = generators.state();
    const pkce = this.generatePKCE();
    this.pkceStore.set(state, { ...pkce, createdAt: this.now() });

    const url = this.client.authorizationUrl({
      scope: (this.config.scopes ?? TWITTER_SCOPES).join(' '),
      state,
      code_challenge: pkce.codeChallenge,
      code_challenge_method: pkce.method,
    });

    this.logger.debug('Created auth URL', { state });
    return { url, state };
  }

  /**
   * Exchange the authorization code returned to the redirect URI.
   *
   * @throws {OAuthError} for an unknown or expired state, or a rejected exchange
   */
  async exchangeCode(code: string, state: string): Promise<TokenSet> {
    return withSpan('oauth.exchangeCode', async () => {
      const pkce = this.pkceStore.get(state);
      if (!pkce) throw new OAuthError('Invalid or expired state parameter');
      this.pkceStore.delete(state);

      if (this.now() - pkce.createdAt > this.PKCE_TTL) {
        throw new OAuthError('PKCE challenge expired, restart authorization flow');
      }

      let tokenSet: OidcTokenSet;
      try {
        tokenSet = await this.client.oauthCallback(
          this.config.redirectUri,
          { code, state },
          { code_verifier: pkce.codeVerifier, state }
        );
      } catch (error: unknown) {
        const message = toError(error).message;
        this.logger.error('Token exchange failed', { error: message });
        throw new OAuthError('Failed to exchange authorization code', { cause: message });
      }

      this.logger.debug('Token exchange successful', {
        hasRefreshToken: Boolean(tokenSet.refresh_token),
        expiresIn: tokenSet.expires_in,
      });
      return toTokenSet(tokenSet);
    });
  }

  /**
   * Trade a refresh token for a new pair. Twitter rotates refresh tokens,
   * so the returned one replaces the old.
   */
  async refreshToken(refreshToken: string): Promise<TokenSet> {
    return withSpan('oauth.refreshToken', async () => {
      let tokenSet: OidcTokenSet;
      try {
        tokenSet = await this.client.refresh(refreshToken);
      } catch (error: unknown) {
        const message = toError(error).message;
        this.logger.error('Token refresh failed', { error: message });
        throw new OAuthError('Failed to refresh token', { cause: message });
      }

      const tokens = toTokenSet(tokenSet);
      return { ...tokens, refreshToken: tokens.refreshToken ?? refreshToken };
    });
  }

  private generatePKCE(): PKCEChallenge {
    const codeVerifier = generators.codeVerifier();
    return {
      codeVerifier,
      codeChallenge: generators.codeChallenge(codeVerifier),
      method: 'S256',
    };
  }

  private cleanupExpiredChallenges(): void {
    const now = this.now();
    for (const [state, challenge] of this.pkceStore.entries()) {
      if (now - challenge.createdAt > this.PKCE_TTL) {
        this.pkceStore.delete(state);
      }
    }
  }
}

function toTokenSet(tokenSet: OidcTokenSet): TokenSet {
  if (!tokenSet.access_token) {
    throw new OAuthError('Token response did not include an access token');
  }
  return {
    accessToken: tokenSet.access_token,
    refreshToken: tokenSet.refresh_token,
    expiresAt: tokenSet.expires_at ? new Date(tokenSet.expires_at * 1000) : undefined,
    scope: tokenSet.scope,
    tokenType: tokenSet.token_type,
  };
}
