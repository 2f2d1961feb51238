import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { chunk } from '../utils/chunk.util';
import { Clock } from '../utils/clock.service';
import { errorMessage, isAbortError } from '../utils/abort.util';
import { LiveStream, TrackedStreamer } from './interfaces/tracked-streamer.interface';
import { StreamStatusSource } from './interfaces/stream-status-source';
import { UserLookup } from './interfaces/user-lookup';
import { NowLiveEvent } from './now-live.events';
import { NowLiveEventBus } from './now-live-event.bus';
import { StreamerDataStore } from './streamer-data.store';
import { StreamerRoster } from './streamer-roster';

export enum UserManagementResult {
  NotFound = 0,
  Success = 1,
  AlreadyExists = 2,
  Error = 3,
}

export const WAS_NOT_UPDATED = 'Was not updated';
const HELIX_MAX_IDS = 100;

type BroadcastTransitionEvent =
  | NowLiveEvent.BroadcastDetectedLive
  | NowLiveEvent.BroadcastEnded
  | NowLiveEvent.BroadcastContinuing
  | NowLiveEvent.BroadcastMediaRefreshDue;

interface TransitionBuckets {
  detectedLive: TrackedStreamer[];
  ended: TrackedStreamer[];
  continuing: TrackedStreamer[];
  mediaRefreshDue: TrackedStreamer[];
}

@Injectable()
export class NowLiveService {
  private readonly logger = new Logger(NowLiveService.name);
  private readonly roster = new StreamerRoster();

  constructor(
    private readonly statusSource: StreamStatusSource,
    private readonly userLookup: UserLookup,
    private readonly dataStore: StreamerDataStore,
    private readonly eventBus: NowLiveEventBus,
    private readonly clock: Clock,
    private readonly configService: ConfigService,
  ) {}

  private get maxUsersPerRequest(): number {
    return Math.min(this.configService.get<number>('NOW_LIVE_MAX_USERS_PER_REQUEST') ?? HELIX_MAX_IDS, HELIX_MAX_IDS);
  }

  private get mediaRefreshIntervalMs(): number {
    return (this.configService.get<number>('NOW_LIVE_MEDIA_REFRESH_INTERVAL') ?? 6) * 60 * 1000;
  }

  /**
   * Snapshot of the tracked streamers
   */
  getUsers(): TrackedStreamer[] {
    return this.roster.values().map((streamer) => ({ ...streamer }));
  }

  async loadUsers(signal?: AbortSignal): Promise<void> {
    this.roster.replaceAll(await this.dataStore.load(signal));
    this.logger.log(`📋 Tracking ${this.roster.size} streamers`);
  }

  async saveUsers(signal?: AbortSignal): Promise<void> {
    await this.dataStore.save(this.roster.values(), signal);
  }

  /**
   * Start tracking a Twitch login. New entries are offline until the next poll sees them live.
   */
  async addUser(login: string, signal?: AbortSignal): Promise<UserManagementResult> {
    const profile = await this.userLookup.findByLogin(login, signal);
    if (!profile) {
      return UserManagementResult.NotFound;
    }

    const streamer: TrackedStreamer = {
      id: profile.id,
      login: profile.login,
      displayName: profile.displayName,
      profileImageUrl: profile.profileImageUrl,
      isLive: false,
      lastOnline: null,
      nextMediaRefreshAt: null,
      broadcast: null,
    };

    if (!this.roster.tryAdd(streamer)) {
      return UserManagementResult.AlreadyExists;
    }

    this.logger.log(`✅ Now tracking ${streamer.displayName} (${streamer.id})`);
    this.eventBus.emit(NowLiveEvent.UserAdded, { streamers: [{ ...streamer }], signal });
    await this.saveUsers(signal);
    return UserManagementResult.Success;
  }

  /**
   * Stop tracking a login, matched without regard to case
   */
  async removeUser(login: string, signal?: AbortSignal): Promise<UserManagementResult> {
    const match = this.roster.findByLogin(login);
    if (!match) {
      return UserManagementResult.NotFound;
    }

    const removed = this.roster.tryRemove(match.id);
    if (!removed) {
      return UserManagementResult.Error;
    }

    this.logger.log(`🗑️ Stopped tracking ${removed.displayName} (${removed.id})`);
    this.eventBus.emit(NowLiveEvent.UserRemoved, { streamers: [removed], signal });
    await this.saveUsers(signal);
    return UserManagementResult.Success;
  }

  /**
   * One polling cycle: query every batch, classify each streamer's transition,
   * notify per category and persist the roster.
   */
  async updateStreamStates(signal: AbortSignal): Promise<void> {
    const now = this.clock.now();
    const batches = chunk(this.roster.ids(), this.maxUsersPerRequest);

    for (const batch of batches) {
      signal.throwIfAborted();

      let buckets: TransitionBuckets;
      try {
        const streams = await this.statusSource.getLiveStreams(batch, signal);
        buckets = this.classify(batch, streams, now);
      } catch (error) {
        if (isAbortError(error)) {
          throw error;
        }
        this.logger.error(`❌ Failed to update ${batch.length} streamers: ${errorMessage(error)}`);
        for (const userId of batch) {
          this.eventBus.emit(NowLiveEvent.UserStreamError, { userId, message: WAS_NOT_UPDATED, error });
        }
        continue;
      }

      this.notify(buckets, signal);
    }

    await this.saveUsers(signal);
    this.logger.debug(`🔄 Stream states updated for ${this.roster.size} streamers in ${batches.length} batches`);
  }

  private classify(batch: readonly string[], streams: readonly LiveStream[], now: Date): TransitionBuckets {
    const liveById = new Map(streams.map((stream) => [stream.userId, stream]));
    const nextRefresh = new Date(now.getTime() + this.mediaRefreshIntervalMs);
    const buckets: TransitionBuckets = { detectedLive: [], ended: [], continuing: [], mediaRefreshDue: [] };

    for (const id of batch) {
      // Removed while the query was in flight
      const streamer = this.roster.get(id);
      if (!streamer) {
        continue;
      }

      const live = liveById.get(id);
      if (live && !streamer.isLive) {
        streamer.isLive = true;
        streamer.lastOnline = now;
        streamer.nextMediaRefreshAt = nextRefresh;
        streamer.broadcast = live.broadcast;
        buckets.detectedLive.push({ ...streamer });
      } else if (live) {
        streamer.broadcast = live.broadcast;
        if (streamer.nextMediaRefreshAt && now.getTime() >= streamer.nextMediaRefreshAt.getTime()) {
          streamer.nextMediaRefreshAt = nextRefresh;
          buckets.mediaRefreshDue.push({ ...streamer });
        } else {
          buckets.continuing.push({ ...streamer });
        }
      } else if (streamer.isLive) {
        streamer.isLive = false;
        streamer.lastOnline = null;
        streamer.nextMediaRefreshAt = null;
        // The notification keeps the finished broadcast so its duration can be shown
        buckets.ended.push({ ...streamer });
        streamer.broadcast = null;
      }
    }

    return buckets;
  }

  private notify(buckets: TransitionBuckets, signal: AbortSignal): void {
    const notifications: Array<[BroadcastTransitionEvent, TrackedStreamer[]]> = [
      [NowLiveEvent.BroadcastDetectedLive, buckets.detectedLive],
      [NowLiveEvent.BroadcastEnded, buckets.ended],
      [NowLiveEvent.BroadcastContinuing, buckets.continuing],
      [NowLiveEvent.BroadcastMediaRefreshDue, buckets.mediaRefreshDue],
    ];

    for (const [event, streamers] of notifications) {
      if (streamers.length > 0) {
        this.eventBus.emit(event, { streamers, signal });
      }
    }
  }
}
