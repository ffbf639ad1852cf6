// src/core/auth/types.ts

export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

/** Raw body of Reddit's /api/v1/access_token response */
export interface AccessTokenResponse {
  access_token?: string;
  token_type?: string;
  expires_in?: number;
  scope?: string;
  error?: string;
}

export interface TokenSet {
  accessToken: string;
  expiresAt?: Date;
  scope?: string;
  tokenType?: string;
}
