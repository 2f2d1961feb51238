import { Injectable, Logger } from '@nestjs/common';
import { TrackedStreamer } from '../now-live/interfaces/tracked-streamer.interface';
import {
  LifecyclePayload,
  NowLiveEvent,
  NowLiveSubscriber,
  StreamErrorPayload,
  StreamersPayload,
} from '../now-live/now-live.events';
import { SentryService } from '../sentry/sentry.service';
import { errorMessage, isAbortError } from '../utils/abort.util';
import { ActiveBroadcastsService } from './active-broadcasts.service';

/**
 * Reflects tracker events in Discord.
 *
 * A streamer reported live may already have a message from before a restart:
 * those are edited, never posted twice.
 */
@Injectable()
export class BroadcastStatesHandler {
  private readonly logger = new Logger(BroadcastStatesHandler.name);

  constructor(
    private readonly activeBroadcasts: ActiveBroadcastsService,
    private readonly sentryService: SentryService,
  ) {}

  toSubscriber(): NowLiveSubscriber {
    return {
      [NowLiveEvent.ServiceStarting]: (payload) => this.onServiceStarting(payload),
      [NowLiveEvent.ServiceStarted]: () => this.logger.debug('Now live service has started'),
      [NowLiveEvent.ServiceExiting]: () => this.logger.debug('Now live service is exiting'),
      [NowLiveEvent.ServiceExited]: () => this.logger.debug('Now live service has exited'),
      [NowLiveEvent.BroadcastDetectedLive]: (payload) => this.onBroadcastLive(payload, 'detected live', false),
      [NowLiveEvent.BroadcastContinuing]: (payload) => this.onBroadcastLive(payload, 'continuing', false),
      [NowLiveEvent.BroadcastMediaRefreshDue]: (payload) => this.onBroadcastLive(payload, 'media refresh', true),
      [NowLiveEvent.BroadcastEnded]: (payload) => this.onBroadcastEnded(payload),
      [NowLiveEvent.UserAdded]: (payload) =>
        this.logger.debug(`${payload.streamers.length} user(s) added to tracking list`),
      [NowLiveEvent.UserRemoved]: (payload) => this.onUserRemoved(payload),
      [NowLiveEvent.UserStreamError]: (payload) => this.onUserStreamError(payload),
    };
  }

  async onServiceStarting({ signal }: LifecyclePayload): Promise<void> {
    await this.guard('prepare active broadcasts', async () => {
      await this.activeBroadcasts.loadData(signal);
      await this.activeBroadcasts.ensureStatusMessageExists(signal);
    });
  }

  async onBroadcastLive({ streamers, signal }: StreamersPayload, state: string, refreshMedia: boolean): Promise<void> {
    this.logger.debug(`Streams ${state} (total: ${streamers.length})`);

    const results = await Promise.allSettled(
      streamers.map((streamer) =>
        this.activeBroadcasts.isMessageTracked(streamer.id)
          ? this.activeBroadcasts.updateBroadcastMessage(streamer, signal, refreshMedia)
          : this.activeBroadcasts.createBroadcastMessage(streamer, signal),
      ),
    );
    this.reportFailures(results, streamers, state);
    await this.guard('update summary', () => this.activeBroadcasts.updateSummary(signal));
  }

  async onBroadcastEnded({ streamers, signal }: StreamersPayload): Promise<void> {
    this.logger.debug(`Streams ended (total: ${streamers.length})`);

    const results = await Promise.allSettled(
      streamers.map((streamer) => this.activeBroadcasts.endBroadcastMessage(streamer, signal)),
    );
    this.reportFailures(results, streamers, 'ended');
    await this.guard('update summary', () => this.activeBroadcasts.updateSummary(signal));
  }

  async onUserRemoved({ streamers, signal }: StreamersPayload): Promise<void> {
    this.logger.debug(`${streamers.length} user(s) removed from tracking list`);

    const results = await Promise.allSettled(
      streamers.map((streamer) => this.activeBroadcasts.discardBroadcastMessage(streamer.id, signal)),
    );
    this.reportFailures(results, streamers, 'removed');
    await this.guard('update summary', () => this.activeBroadcasts.updateSummary(signal));
  }

  onUserStreamError({ userId, message, error }: StreamErrorPayload): void {
    this.logger.error(`❌ Error processing user stream - userId: ${userId}, ${message}: ${errorMessage(error)}`);
    this.sentryService.captureException(error, { userId, message });
  }

  private reportFailures(results: PromiseSettledResult<void>[], streamers: TrackedStreamer[], state: string) {
    results.forEach((result, index) => {
      if (result.status === 'fulfilled' || isAbortError(result.reason)) {
        return;
      }
      const streamer = streamers[index];
      this.logger.error(
        `❌ Failed to process ${state} state for ${streamer.displayName} (${streamer.id}): ${errorMessage(result.reason)}`,
      );
      this.sentryService.captureException(result.reason, { userId: streamer.id, state });
    });
  }

  private async guard(operation: string, task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } catch (error) {
      if (isAbortError(error)) {
        this.logger.debug(`Cancelled: ${operation}`);
        return;
      }
      this.logger.error(`❌ Failed to ${operation}: ${errorMessage(error)}`);
      this.sentryService.captureException(error, { operation });
    }
  }
}
