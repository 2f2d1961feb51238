import { Injectable, Logger, OnApplicationBootstrap, OnApplicationShutdown } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { errorMessage, isAbortError } from '../utils/abort.util';
import { TwitchAuthService } from './twitch-auth.service';

export const TOKEN_REFRESH_TIMEOUT = 'twitch-token-refresh';
export const TOKEN_NORMAL_DELAY_MS = 10 * 60 * 1000;
const TOKEN_MAX_RETRIES = 3;
const TOKEN_MAX_DELAY_SECONDS = 300;

/**
 * Backoff after `retryCount` consecutive failures: 2, 4, 8, 8, ... seconds, capped at five minutes.
 */
export function retryDelayMs(retryCount: number): number {
  const exponentialSeconds = Math.pow(2, Math.min(retryCount, TOKEN_MAX_RETRIES));
  return Math.min(exponentialSeconds, TOKEN_MAX_DELAY_SECONDS) * 1000;
}

@Injectable()
export class TokenRefreshScheduler implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(TokenRefreshScheduler.name);
  private readonly abortController = new AbortController();
  private retryCount = 0;

  constructor(
    private readonly authService: TwitchAuthService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  onApplicationBootstrap() {
    this.schedule(0);
  }

  onApplicationShutdown() {
    this.abortController.abort();
    this.clear();
  }

  /**
   * Keep the app access token warm so polling never waits on the OAuth endpoint
   */
  async handleTokenRefresh(): Promise<void> {
    if (this.abortController.signal.aborted) {
      return;
    }

    try {
      await this.authService.getAccessToken(this.abortController.signal);
      this.retryCount = 0;
      this.schedule(TOKEN_NORMAL_DELAY_MS);
    } catch (error) {
      if (isAbortError(error)) {
        this.logger.log('⏸️ Token refresh stopped');
        return;
      }

      this.retryCount++;
      const delay = retryDelayMs(this.retryCount);
      this.logger.error(
        `❌ Error refreshing Twitch token - attempt ${this.retryCount}, retrying in ${delay / 1000}s: ${errorMessage(error)}`,
      );
      this.schedule(delay);
    }
  }

  private schedule(delayMs: number) {
    if (this.abortController.signal.aborted) {
      return;
    }
    this.clear();
    const timeout = setTimeout(() => {
      this.schedulerRegistry.deleteTimeout(TOKEN_REFRESH_TIMEOUT);
      void this.handleTokenRefresh();
    }, delayMs);
    this.schedulerRegistry.addTimeout(TOKEN_REFRESH_TIMEOUT, timeout);
  }

  private clear() {
    if (this.schedulerRegistry.doesExist('timeout', TOKEN_REFRESH_TIMEOUT)) {
      this.schedulerRegistry.deleteTimeout(TOKEN_REFRESH_TIMEOUT);
    }
  }
}
