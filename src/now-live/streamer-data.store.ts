import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Mutex } from 'async-mutex';
import * as path from 'path';
import { errorMessage, isAbortError } from '../utils/abort.util';
import { readJsonFile, writeJsonFileAtomic } from '../utils/json-file.util';
import { toValidatedInstances } from '../utils/validation.util';
import { StreamerSnapshotDto } from './dto/streamer-snapshot.dto';
import { TrackedStreamer } from './interfaces/tracked-streamer.interface';

function toTrackedStreamer(snapshot: StreamerSnapshotDto): TrackedStreamer {
  // A live entry without broadcast metadata cannot be displayed; it is re-detected on the next poll
  const broadcast = snapshot.isLive ? snapshot.broadcast ?? null : null;
  const isLive = broadcast !== null;

  return {
    id: snapshot.id,
    login: snapshot.login,
    displayName: snapshot.displayName,
    profileImageUrl: snapshot.profileImageUrl,
    isLive,
    lastOnline: snapshot.lastOnline ?? null,
    nextMediaRefreshAt: isLive ? snapshot.nextMediaRefreshAt ?? null : null,
    broadcast: broadcast && {
      title: broadcast.title,
      categoryId: broadcast.categoryId,
      categoryName: broadcast.categoryName,
      viewerCount: broadcast.viewerCount,
      startedAt: broadcast.startedAt,
      thumbnailUrl: broadcast.thumbnailUrl,
      language: broadcast.language,
    },
  };
}

/**
 * Reads and writes the tracked roster as a JSON file. Loads and saves never overlap.
 */
@Injectable()
export class StreamerDataStore {
  private readonly logger = new Logger(StreamerDataStore.name);
  private readonly mutex = new Mutex();
  private readonly filePath: string;

  constructor(configService: ConfigService) {
    this.filePath = path.resolve(configService.get<string>('NOW_LIVE_USER_DATA_FILE') ?? 'NowLiveUserData.json');
  }

  async load(signal?: AbortSignal): Promise<TrackedStreamer[]> {
    return this.mutex.runExclusive(async () => {
      try {
        const raw = await readJsonFile(this.filePath, signal);
        if (raw === undefined) {
          this.logger.log(`📂 No roster found at ${this.filePath}, starting empty`);
          return [];
        }

        const streamers = toValidatedInstances(StreamerSnapshotDto, raw).map(toTrackedStreamer);
        this.logger.log(`✅ Loaded ${streamers.length} tracked streamers from ${this.filePath}`);
        return streamers;
      } catch (error) {
        if (isAbortError(error)) {
          throw error;
        }
        this.logger.error(`❌ Could not read roster ${this.filePath}, starting empty: ${errorMessage(error)}`);
        return [];
      }
    });
  }

  async save(streamers: readonly TrackedStreamer[], signal?: AbortSignal): Promise<void> {
    await this.mutex.runExclusive(async () => {
      try {
        await writeJsonFileAtomic(this.filePath, streamers, signal);
        this.logger.debug(`💾 Saved ${streamers.length} tracked streamers`);
      } catch (error) {
        if (!isAbortError(error)) {
          this.logger.error(`❌ Failed to save roster ${this.filePath}: ${errorMessage(error)}`);
        }
        throw error;
      }
    });
  }
}
