export interface OAuthConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scope: string;
  tokenStoragePath: string;
}

export interface CredentialRecord {
  clientId: string;
  clientSecret: string;
  accessToken: string;
  refreshToken: string;
  // Advisory only; expiry is detected through 401 responses.
  expiresHint?: string;
}

export type TokenState = 'Unauthenticated' | 'Authenticated' | 'Refreshing';

export interface OAuthTokenResponse {
  access_token: string;
  refresh_token?: string;
  token_type?: string;
  expires_in?: number;
  scope?: string;
}

export function emptyCredentialRecord(clientId = '', clientSecret = ''): CredentialRecord {
  return {
    clientId,
    clientSecret,
    accessToken: '',
    refreshToken: '',
  };
}

export function isOAuthTokenResponse(value: unknown): value is OAuthTokenResponse {
  if (typeof value !== 'object' || value === null || !('access_token' in value)) {
    return false;
  }
  if (typeof value.access_token !== 'string' || value.access_token.length === 0) {
    return false;
  }
  return !('refresh_token' in value) || value.refresh_token === undefined || typeof value.refresh_token === 'string';
}
