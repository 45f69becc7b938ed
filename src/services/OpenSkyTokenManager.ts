import config from '../config';
import logger from '../utils/logger';
import httpClient from '../utils/httpClient';
import { tokenResponseSchema } from '../schemas/opensky.schemas';

export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
  tokenUrl: string;
  scope?: string;
}

// Refresh a little before the server-side expiry
const EXPIRY_MARGIN_MS = 30_000;

/**
 * Fetches and caches OAuth2 access tokens (client credentials grant)
 */
export class OpenSkyTokenManager {
  private accessToken: string | null = null;

  private expiresAt = 0;

  private pendingToken: Promise<string> | null = null;

  constructor(private readonly credentials: ClientCredentials) {}

  async getAccessToken(): Promise<string> {
    if (this.accessToken && Date.now() < this.expiresAt) {
      return this.accessToken;
    }

    if (!this.pendingToken) {
      this.pendingToken = this.requestToken().finally(() => {
        this.pendingToken = null;
      });
    }
    return this.pendingToken;
  }

  /**
   * Drop the cached token, e.g. after the API answered 401
   */
  invalidate(): void {
    this.accessToken = null;
    this.expiresAt = 0;
  }

  private async requestToken(): Promise<string> {
    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret,
    });
    if (this.credentials.scope) {
      form.set('scope', this.credentials.scope);
    }

    const response = await httpClient.post<unknown>(this.credentials.tokenUrl, form.toString(), {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      timeout: config.external.opensky.timeoutMs,
    });

    const token = tokenResponseSchema.parse(response.data);
    this.accessToken = token.access_token;
    this.expiresAt = Date.now() + Math.max(0, token.expires_in * 1000 - EXPIRY_MARGIN_MS);

    logger.debug('Obtained OpenSky access token', { expiresInSeconds: token.expires_in });
    return token.access_token;
  }
}

export default OpenSkyTokenManager;
