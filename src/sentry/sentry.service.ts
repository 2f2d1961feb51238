import { Injectable, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as Sentry from '@sentry/node';

@Injectable()
export class SentryService implements OnModuleInit {
  private readonly enabled: boolean;
  private readonly environment: string;

  constructor(private readonly configService: ConfigService) {
    // Only report from production, and only when a DSN was provided
    this.environment = this.configService.get<string>('NODE_ENV') || 'development';
    this.enabled = this.environment === 'production' && !!this.configService.get<string>('SENTRY_DSN');
  }

  onModuleInit() {
    if (!this.enabled) {
      return;
    }

    Sentry.init({
      dsn: this.configService.get<string>('SENTRY_DSN'),
      environment: this.environment,
      tracesSampleRate: 1.0,
      beforeSend(event) {
        // Cancelled polls during shutdown are not failures
        if (event.exception?.values?.some((value) => value.type === 'AbortError')) {
          return null;
        }
        return event;
      },
    });
  }

  /**
   * Capture and report errors with context
   */
  captureException(error: unknown, context?: Record<string, unknown>) {
    if (!this.enabled) {
      return;
    }

    Sentry.withScope((scope) => {
      if (context) {
        Object.entries(context).forEach(([key, value]) => {
          scope.setExtra(key, value);
        });
      }
      Sentry.captureException(error);
    });
  }

  /**
   * Capture custom messages with severity levels
   */
  captureMessage(message: string, level: Sentry.SeverityLevel = 'error', context?: Record<string, unknown>) {
    if (!this.enabled) {
      return;
    }

    Sentry.withScope((scope) => {
      if (context) {
        Object.entries(context).forEach(([key, value]) => {
          scope.setExtra(key, value);
        });
      }
      Sentry.captureMessage(message, level);
    });
  }
}
