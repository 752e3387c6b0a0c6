import axios from 'axios';
import { UpstreamError } from '../utils/errors';
import { createLogger } from '../utils/logger';

/**
 * OAuth2 client-credentials tokens for the OpenSky API.
 * Without credentials every call proceeds anonymously.
 */

export const DEFAULT_OPENSKY_AUTH_URL =
  'https://auth.opensky-network.org/auth/realms/opensky-network/protocol/openid-connect/token';

// =============================================================================
// Types
// =============================================================================

interface TokenResponse {
  access_token?: string;
  expires_in?: number;
  token_type?: string;
}

export interface OpenSkyAuthOptions {
  clientId?: string;
  clientSecret?: string;
  authUrl?: string;
  timeoutMs?: number;
  clock?: () => number;
}

export interface OpenSkyAuthStatus {
  credentialsConfigured: boolean;
  lastAuthSuccessAt: number | null;
  lastAuthErrorAt: number | null;
  lastAuthErrorMessage: string | null;
  tokenExpiresAt: number;
}

// =============================================================================
// OpenSky Auth Service
// =============================================================================

export class OpenSkyAuthService {
  private readonly logger = createLogger({ component: 'OpenSkyAuthService' });
  private readonly refreshBufferMs = 60_000; // refresh 60s before expiry
  private readonly clientId: string | null;
  private readonly clientSecret: string | null;
  private readonly authUrl: string;
  private readonly timeoutMs: number;
  private readonly clock: () => number;

  private accessToken: string | null = null;
  private tokenExpiresAt = 0;
  private refreshPromise: Promise<string> | null = null;
  private lastAuthSuccessAt: number | null = null;
  private lastAuthErrorAt: number | null = null;
  private lastAuthErrorMessage: string | null = null;

  constructor(options: OpenSkyAuthOptions = {}) {
    this.clientId = options.clientId || null;
    this.clientSecret = options.clientSecret || null;
    this.authUrl = options.authUrl ?? DEFAULT_OPENSKY_AUTH_URL;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.clock = options.clock ?? Date.now;
  }

  hasCredentials(): boolean {
    return this.clientId !== null && this.clientSecret !== null;
  }

  getStatus(): OpenSkyAuthStatus {
    return {
      credentialsConfigured: this.hasCredentials(),
      lastAuthSuccessAt: this.lastAuthSuccessAt,
      lastAuthErrorAt: this.lastAuthErrorAt,
      lastAuthErrorMessage: this.lastAuthErrorMessage,
      tokenExpiresAt: this.tokenExpiresAt,
    };
  }

  /**
   * Bearer header when credentials are configured, otherwise an empty object
   */
  async getAuthorizationHeader(options: { forceRefresh?: boolean } = {}): Promise<Record<string, string>> {
    if (!this.hasCredentials()) {
      return {};
    }
    if (options.forceRefresh) {
      this.invalidateToken();
    }

    const token = await this.getAccessToken();
    return { Authorization: `Bearer ${token}` };
  }

  invalidateToken(): void {
    this.accessToken = null;
    this.tokenExpiresAt = 0;
  }

  /**
   * Run an authorised request. A 401 invalidates the token and the request
   * is repeated once with a fresh one.
   */
  async withAuthorization<T>(request: (headers: Record<string, string>) => Promise<T>): Promise<T> {
    const headers = await this.getAuthorizationHeader();

    try {
      return await request(headers);
    } catch (error) {
      if (this.hasCredentials() && axios.isAxiosError(error) && error.response?.status === 401) {
        this.logger.warn('OpenSky rejected the access token, refreshing');
        return request(await this.getAuthorizationHeader({ forceRefresh: true }));
      }
      throw error;
    }
  }

  private getAccessToken(): Promise<string> {
    if (this.accessToken && this.clock() < this.tokenExpiresAt - this.refreshBufferMs) {
      return Promise.resolve(this.accessToken);
    }

    // Concurrent callers share one token request
    if (this.refreshPromise) {
      return this.refreshPromise;
    }

    const pending = this.requestNewToken().finally(() => {
      this.refreshPromise = null;
    });
    this.refreshPromise = pending;
    return pending;
  }

  private async requestNewToken(): Promise<string> {
    const params = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.clientId ?? '',
      client_secret: this.clientSecret ?? '',
    });

    try {
      const response = await axios.post<TokenResponse>(this.authUrl, params, {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        timeout: this.timeoutMs,
      });

      const token = response.data?.access_token;
      if (!token) {
        throw new UpstreamError('OpenSky token response did not include access_token', { status: response.status });
      }

      const expiresInSeconds = response.data.expires_in ?? 1800; // default 30 minutes
      const now = this.clock();
      this.accessToken = token;
      this.tokenExpiresAt = now + expiresInSeconds * 1000;
      this.lastAuthSuccessAt = now;
      this.lastAuthErrorAt = null;
      this.lastAuthErrorMessage = null;

      this.logger.info({ expiresInSeconds }, '🔑 OpenSky access token acquired');
      return token;
    } catch (error) {
      this.lastAuthErrorAt = this.clock();
      this.lastAuthErrorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error({ error: this.lastAuthErrorMessage }, 'Failed to acquire OpenSky access token');
      throw error;
    }
  }
}
