import { Injectable, Logger, OnApplicationBootstrap, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { BroadcastStatesHandler } from '../broadcasts/broadcast-states.handler';
import { SentryService } from '../sentry/sentry.service';
import { errorMessage, isAbortError } from '../utils/abort.util';
import { NowLiveEvent, NowLiveSubscriber } from './now-live.events';
import { NowLiveEventBus } from './now-live-event.bus';
import { NowLiveService } from './now-live.service';

export const NOW_LIVE_UPDATE_INTERVAL = 'now-live-update';

/**
 * Drives the tracker: announces the lifecycle, polls on a fixed interval
 * and saves the roster on shutdown.
 */
@Injectable()
export class NowLiveRunner implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(NowLiveRunner.name);
  private readonly abortController = new AbortController();
  private readonly subscriber: NowLiveSubscriber;
  private currentTick: Promise<void> | null = null;
  private stopped = false;

  constructor(
    private readonly nowLiveService: NowLiveService,
    private readonly eventBus: NowLiveEventBus,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly configService: ConfigService,
    private readonly sentryService: SentryService,
    broadcastStatesHandler: BroadcastStatesHandler,
  ) {
    this.subscriber = broadcastStatesHandler.toSubscriber();
    this.eventBus.subscribe(this.subscriber);
  }

  async onApplicationBootstrap() {
    const signal = this.abortController.signal;

    this.logger.log('🚀 Now live tracker started');
    this.eventBus.emit(NowLiveEvent.ServiceStarted, {});

    this.logger.log('🔄 Now live tracker starting');
    this.eventBus.emit(NowLiveEvent.ServiceStarting, { signal });
    await this.nowLiveService.loadUsers(signal);

    const seconds = this.configService.get<number>('NOW_LIVE_UPDATE_INTERVAL') ?? 60;
    const interval = setInterval(() => {
      void this.runTick();
    }, seconds * 1000);
    this.schedulerRegistry.addInterval(NOW_LIVE_UPDATE_INTERVAL, interval);
    this.logger.log(`⏱️ Polling Twitch every ${seconds}s`);
  }

  /**
   * Run one polling cycle unless the previous one is still in flight
   */
  async runTick(): Promise<void> {
    if (this.currentTick) {
      this.logger.warn('⏸️ Skipping stream state update - previous update still running');
      return;
    }

    this.currentTick = this.tick();
    try {
      await this.currentTick;
    } finally {
      this.currentTick = null;
    }
  }

  async onApplicationShutdown(signal?: string) {
    if (this.stopped) {
      return;
    }
    this.stopped = true;

    if (this.schedulerRegistry.doesExist('interval', NOW_LIVE_UPDATE_INTERVAL)) {
      this.schedulerRegistry.deleteInterval(NOW_LIVE_UPDATE_INTERVAL);
    }
    this.abortController.abort();
    if (this.currentTick) {
      await this.currentTick;
    }

    this.logger.log(`🛑 Now live tracker exiting${signal ? ` (${signal})` : ''}`);
    this.eventBus.emit(NowLiveEvent.ServiceExiting, { signal: this.abortController.signal });

    try {
      await this.nowLiveService.saveUsers();
    } catch (error) {
      this.sentryService.captureException(error, { operation: 'shutdownSave' });
    }

    await this.eventBus.drain();
    this.eventBus.unsubscribe(this.subscriber);
    this.logger.log('👋 Now live tracker exited');
    this.eventBus.emit(NowLiveEvent.ServiceExited, {});
  }

  private async tick(): Promise<void> {
    try {
      await this.nowLiveService.updateStreamStates(this.abortController.signal);
    } catch (error) {
      if (isAbortError(error)) {
        this.logger.log('⏸️ Stream state update cancelled');
        return;
      }
      this.logger.error(
        `❌ Error updating stream states: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      this.sentryService.captureException(error, { operation: 'updateStreamStates' });
    }
  }
}
