import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { Mutex } from 'async-mutex';
import { TwitchTokenResponse } from './interfaces/helix.interface';

const TWITCH_TOKEN_URL = 'https://id.twitch.tv/oauth2/token';
const TOKEN_REQUEST_TIMEOUT_MS = 10_000;
// Renew five minutes before Twitch says the token expires
const EXPIRY_MARGIN_SECONDS = 300;

interface CachedToken {
  accessToken: string;
  expiresAt: number; // Unix timestamp in milliseconds
}

@Injectable()
export class TwitchAuthService {
  private readonly logger = new Logger(TwitchAuthService.name);
  private readonly mutex = new Mutex();
  private cached: CachedToken | null = null;

  constructor(private readonly configService: ConfigService) {}

  get clientId(): string {
    return this.configService.getOrThrow<string>('TWITCH_CLIENT_ID');
  }

  /**
   * Get the app access token, requesting a new one through the
   * Client Credentials flow when the cached one is missing or about to expire.
   * Docs: https://dev.twitch.tv/docs/authentication/getting-tokens-oauth#client-credentials-grant-flow
   */
  async getAccessToken(signal?: AbortSignal): Promise<string> {
    const cached = this.currentToken();
    if (cached) {
      return cached;
    }

    return this.mutex.runExclusive(async () => {
      // Another caller may have refreshed while we waited for the lock
      const refreshed = this.currentToken();
      if (refreshed) {
        return refreshed;
      }
      return this.requestToken(signal);
    });
  }

  /**
   * Drop the cached token, e.g. after Helix rejected it with a 401
   */
  invalidate(): void {
    this.cached = null;
  }

  private currentToken(): string | null {
    if (this.cached && Date.now() < this.cached.expiresAt) {
      return this.cached.accessToken;
    }
    return null;
  }

  private async requestToken(signal?: AbortSignal): Promise<string> {
    const params = new URLSearchParams();
    params.append('client_id', this.clientId);
    params.append('client_secret', this.configService.getOrThrow<string>('TWITCH_CLIENT_SECRET'));
    params.append('grant_type', 'client_credentials');

    const response = await axios.post<TwitchTokenResponse>(TWITCH_TOKEN_URL, params.toString(), {
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      timeout: TOKEN_REQUEST_TIMEOUT_MS,
      signal,
    });

    const { access_token, expires_in } = response.data;
    if (!access_token) {
      throw new Error('Twitch token response did not contain an access_token');
    }

    const expiresAt = Date.now() + Math.max(expires_in - EXPIRY_MARGIN_SECONDS, 0) * 1000;
    this.cached = { accessToken: access_token, expiresAt };

    this.logger.log(
      `✅ Twitch app access token acquired, expires at ${new Date(expiresAt).toISOString()}`,
    );
    return access_token;
  }
}
