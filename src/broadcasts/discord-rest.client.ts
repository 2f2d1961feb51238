import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance, isAxiosError } from 'axios';
import { DiscordMessage, DiscordMessagePayload } from './interfaces/discord.interface';

export const DISCORD_API_BASE_URL = 'https://discord.com/api/v10';
export const DISCORD_TIMEOUT_MS = 10_000;

export function isNotFoundError(error: unknown): boolean {
  return isAxiosError(error) && error.response?.status === 404;
}

@Injectable()
export class DiscordRestClient {
  private readonly http: AxiosInstance;

  constructor(configService: ConfigService) {
    this.http = axios.create({
      baseURL: DISCORD_API_BASE_URL,
      timeout: DISCORD_TIMEOUT_MS,
      headers: {
        Authorization: `Bot ${configService.getOrThrow<string>('DISCORD_BOT_TOKEN')}`,
        'Content-Type': 'application/json',
      },
    });
  }

  async createMessage(channelId: string, payload: DiscordMessagePayload, signal?: AbortSignal): Promise<DiscordMessage> {
    const response = await this.http.post<DiscordMessage>(`/channels/${channelId}/messages`, payload, { signal });
    return response.data;
  }

  async editMessage(
    channelId: string,
    messageId: string,
    payload: DiscordMessagePayload,
    signal?: AbortSignal,
  ): Promise<DiscordMessage> {
    const response = await this.http.patch<DiscordMessage>(`/channels/${channelId}/messages/${messageId}`, payload, {
      signal,
    });
    return response.data;
  }

  async deleteMessage(channelId: string, messageId: string, signal?: AbortSignal): Promise<void> {
    await this.http.delete(`/channels/${channelId}/messages/${messageId}`, { signal });
  }
}
