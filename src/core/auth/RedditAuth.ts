// src/core/auth/RedditAuth.ts

import type { AccessTokenResponse, ClientCredentials, TokenSet } from './types';
import type { HttpCore } from '../http/HttpCore';
import type { Logger } from '../../observability/Logger';
import { ApiClientError, AuthError } from '../../utils/errors';

export const REDDIT_TOKEN_ENDPOINT = 'https://www.reddit.com/api/v1/access_token';

// Refresh slightly before Reddit says the token expires
const EXPIRY_MARGIN_MS = 60 * 1000;

/**
 * Application-only OAuth2 for Reddit's read API (client credentials grant).
 * The token is held in memory for the life of the process.
 */
export class RedditAuth {
  private token?: TokenSet;

  constructor(
    private credentials: ClientCredentials,
    private http: HttpCore,
    private logger: Logger
  ) {}

  /**
   * Get access token, requesting a new one when none is cached or it is about to expire
   *
   * @throws {AuthError} If Reddit rejects the client id/secret
   */
  async getAccessToken(): Promise<string> {
    if (this.token && !this.isExpiring(this.token)) {
      return this.token.accessToken;
    }

    this.token = await this.requestToken();
    return this.token.accessToken;
  }

  private isExpiring(token: TokenSet): boolean {
    return token.expiresAt !== undefined && token.expiresAt.getTime() <= Date.now() + EXPIRY_MARGIN_MS;
  }

  private async requestToken(): Promise<TokenSet> {
    let body: AccessTokenResponse;

    try {
      const response = await this.http.request<AccessTokenResponse>({
        url: REDDIT_TOKEN_ENDPOINT,
        method: 'POST',
        auth: { username: this.credentials.clientId, password: this.credentials.clientSecret },
        form: { grant_type: 'client_credentials' },
      });
      body = response.data;
    } catch (error: unknown) {
      if (error instanceof ApiClientError && (error.status === 400 || error.status === 401)) {
        throw new AuthError('Reddit rejected the client credentials', { status: error.status });
      }
      throw error;
    }

    // Reddit answers 200 with { error: 'invalid_grant' } for some credential problems
    if (!body.access_token) {
      throw new AuthError('Reddit did not return an access token', { error: body.error });
    }

    this.logger.debug('Reddit access token acquired', {
      tokenType: body.token_type,
      expiresIn: body.expires_in,
      scope: body.scope,
    });

    return {
      accessToken: body.access_token,
      expiresAt: body.expires_in ? new Date(Date.now() + body.expires_in * 1000) : undefined,
      scope: body.scope,
      tokenType: body.token_type,
    };
  }
}
