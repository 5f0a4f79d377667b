import { HttpClient, HttpResponse, isSuccess, parseJson } from './http.js';
import { TokenStore, fileTokenStore } from './token-store.js';
import {
  CredentialRecord,
  OAuthConfig,
  OAuthTokenResponse,
  TokenState,
  emptyCredentialRecord,
  isOAuthTokenResponse,
} from '../types/auth.js';
import {
  AuthExchangeFailedError,
  NotAuthenticatedError,
  RefreshFailedError,
  errorMessage,
} from '../types/errors.js';

export const SMARTTHINGS_TOKEN_URL = 'https://auth-global.api.smartthings.com/oauth/token';

export interface TokenManagerOptions {
  config: OAuthConfig;
  http: HttpClient;
  store?: TokenStore;
  record?: CredentialRecord;
  tokenUrl?: string;
  log?: (line: string) => void;
}

/**
 * Owns the credential record for one SmartThings integration.
 *
 * Expiry is detected lazily: an empty access token, or a 401 reported by a
 * caller through refresh(). Only one refresh request is in flight at a time.
 */
export class TokenManager {
  private config: OAuthConfig;
  private http: HttpClient;
  private store: TokenStore;
  private record: CredentialRecord;
  private tokenUrl: string;
  private log: (line: string) => void;
  private refreshing: Promise<string> | null = null;
  private exchanging: Promise<string> | null = null;
  private pendingCode: string | null = null;

  constructor(options: TokenManagerOptions) {
    this.config = options.config;
    this.http = options.http;
    this.store = options.store ?? fileTokenStore;
    this.record = options.record ?? emptyCredentialRecord(options.config.clientId, options.config.clientSecret);
    this.tokenUrl = options.tokenUrl ?? SMARTTHINGS_TOKEN_URL;
    this.log = options.log ?? console.log;
  }

  get state(): TokenState {
    if (this.refreshing) {
      return 'Refreshing';
    }
    return this.record.accessToken ? 'Authenticated' : 'Unauthenticated';
  }

  getRecord(): CredentialRecord {
    return { ...this.record };
  }

  /**
   * Loads the stored record. Configured client credentials fill in
   * any the file leaves empty.
   */
  async load(): Promise<boolean> {
    const stored = await this.store.load(this.config.tokenStoragePath);
    if (!stored) {
      this.log(`⚠️ No token file found at ${this.config.tokenStoragePath}`);
      return false;
    }

    this.record = {
      ...stored,
      clientId: stored.clientId || this.config.clientId,
      clientSecret: stored.clientSecret || this.config.clientSecret,
    };

    if (this.record.accessToken && !this.record.refreshToken) {
      this.log('⚠️ Token file has an access token but no refresh token; it cannot be renewed when it expires.');
    }
    this.log(`✓ Loaded token file ${this.config.tokenStoragePath}`);
    return true;
  }

  /**
   * Remembers an authorization code for the next getValidToken() call
   * that finds no usable token.
   */
  useAuthorizationCode(code: string): void {
    this.pendingCode = code;
  }

  async exchangeCode(code: string, redirectUri: string): Promise<void> {
    await this.performExchange(code, redirectUri);
  }

  /**
   * Renews the access token. Callers share one in-flight refresh. A caller
   * that passes the token the server rejected gets the current token back
   * without a new request when that token has already been replaced.
   */
  refresh(staleToken?: string): Promise<string> {
    if (this.refreshing) {
      return this.refreshing;
    }
    const current = this.record.accessToken;
    if (staleToken !== undefined && current && current !== staleToken) {
      return Promise.resolve(current);
    }
    const refreshing = this.performRefresh().finally(() => {
      this.refreshing = null;
    });
    this.refreshing = refreshing;
    return refreshing;
  }

  async getValidToken(): Promise<string> {
    if (this.refreshing) {
      return this.refreshing;
    }
    if (this.record.accessToken) {
      return this.record.accessToken;
    }
    if (this.record.refreshToken) {
      return this.refresh();
    }
    if (this.exchanging) {
      return this.exchanging;
    }
    if (this.pendingCode) {
      const code = this.pendingCode;
      this.pendingCode = null;
      this.exchanging = this.performExchange(code, this.config.redirectUri).finally(() => {
        this.exchanging = null;
      });
      return this.exchanging;
    }
    throw new NotAuthenticatedError();
  }

  private async performExchange(code: string, redirectUri: string): Promise<string> {
    this.log('Exchanging authorization code for tokens...');
    const data = new URLSearchParams();
    data.append('grant_type', 'authorization_code');
    data.append('client_id', this.record.clientId);
    data.append('client_secret', this.record.clientSecret);
    data.append('code', code);
    data.append('redirect_uri', redirectUri);

    let response: HttpResponse;
    try {
      response = await this.postForm(data);
    } catch (error) {
      this.log(`✗ Token exchange failed: ${errorMessage(error)}`);
      throw new AuthExchangeFailedError(`Token exchange request failed: ${errorMessage(error)}`);
    }

    if (!isSuccess(response.status)) {
      this.log(`✗ Token exchange failed (HTTP ${response.status}): check the authorization code and redirect URI`);
      throw new AuthExchangeFailedError(`Token exchange failed with HTTP ${response.status}`, response.status);
    }

    const tokens = parseJson(response.body);
    if (!isOAuthTokenResponse(tokens)) {
      this.log('✗ Token exchange failed: response did not contain an access_token');
      throw new AuthExchangeFailedError('Invalid token response', response.status);
    }
    if (!tokens.refresh_token && !this.record.refreshToken) {
      this.log('✗ Token exchange failed: response did not contain a refresh_token');
      throw new AuthExchangeFailedError('Token response is missing refresh_token', response.status);
    }

    this.applyTokens(tokens);
    await this.persist();
    this.log('✓ Token exchange successful');
    return this.record.accessToken;
  }

  private async performRefresh(): Promise<string> {
    if (!this.record.refreshToken) {
      this.log('✗ Token expired, refresh failed: no refresh token available');
      throw new RefreshFailedError('No refresh token available');
    }

    this.log('Refreshing access token...');
    const data = new URLSearchParams();
    data.append('grant_type', 'refresh_token');
    data.append('client_id', this.record.clientId);
    data.append('client_secret', this.record.clientSecret);
    data.append('refresh_token', this.record.refreshToken);

    let response: HttpResponse;
    try {
      response = await this.postForm(data);
    } catch (error) {
      this.log(`✗ Token refresh failed: ${errorMessage(error)}`);
      throw new RefreshFailedError(`Token refresh request failed: ${errorMessage(error)}`);
    }

    if (!isSuccess(response.status)) {
      this.log(`✗ Token expired, refresh failed (HTTP ${response.status}): check credentials`);
      throw new RefreshFailedError(`Token refresh failed with HTTP ${response.status}`, response.status);
    }

    const tokens = parseJson(response.body);
    if (!isOAuthTokenResponse(tokens)) {
      this.log('✗ Token refresh failed: response did not contain an access_token');
      throw new RefreshFailedError('Invalid token refresh response', response.status);
    }

    this.applyTokens(tokens);
    await this.persist();
    this.log('✓ Token refresh successful');
    return this.record.accessToken;
  }

  private postForm(data: URLSearchParams): Promise<HttpResponse> {
    return this.http.request(
      'POST',
      this.tokenUrl,
      {
        'Content-Type': 'application/x-www-form-urlencoded',
        'Accept': 'application/json',
      },
      data.toString()
    );
  }

  private applyTokens(tokens: OAuthTokenResponse): void {
    this.record.accessToken = tokens.access_token;
    if (tokens.refresh_token) {
      this.record.refreshToken = tokens.refresh_token;
    }
    if (typeof tokens.expires_in === 'number') {
      this.record.expiresHint = String(tokens.expires_in);
    }
  }

  // A failed save keeps the in-memory record; the next successful save reconciles.
  private async persist(): Promise<void> {
    try {
      await this.store.save(this.config.tokenStoragePath, this.record);
    } catch (error) {
      this.log(`⚠️ Failed to save token file: ${errorMessage(error)}`);
    }
  }
}
