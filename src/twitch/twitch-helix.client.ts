import { Injectable } from '@nestjs/common';
import axios, { AxiosInstance, isAxiosError } from 'axios';
import { TwitchAuthService } from './twitch-auth.service';

export const HELIX_BASE_URL = 'https://api.twitch.tv/helix';
export const HELIX_TIMEOUT_MS = 10_000;

@Injectable()
export class TwitchHelixClient {
  private readonly http: AxiosInstance;

  constructor(private readonly authService: TwitchAuthService) {
    this.http = axios.create({ baseURL: HELIX_BASE_URL, timeout: HELIX_TIMEOUT_MS });
  }

  /**
   * GET a Helix endpoint with app credentials.
   * A 401 means the cached token was revoked: it is dropped and the request retried once.
   */
  async get<T>(path: string, params: URLSearchParams, signal?: AbortSignal): Promise<T> {
    try {
      return await this.request<T>(path, params, signal);
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 401) {
        this.authService.invalidate();
        return this.request<T>(path, params, signal);
      }
      throw error;
    }
  }

  private async request<T>(path: string, params: URLSearchParams, signal?: AbortSignal): Promise<T> {
    const token = await this.authService.getAccessToken(signal);
    const response = await this.http.get<T>(path, {
      params,
      headers: {
        'Client-Id': this.authService.clientId,
        Authorization: `Bearer ${token}`,
      },
      signal,
    });
    return response.data;
  }
}
