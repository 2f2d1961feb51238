import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Mutex } from 'async-mutex';
import * as path from 'path';
import { TrackedStreamer } from '../now-live/interfaces/tracked-streamer.interface';
import { errorMessage, isAbortError } from '../utils/abort.util';
import { Clock } from '../utils/clock.service';
import { readJsonFile, writeJsonFileAtomic } from '../utils/json-file.util';
import { toValidatedInstance } from '../utils/validation.util';
import { buildEndedEmbed, buildLiveEmbed, buildSummaryContent, EmbedStyle } from './broadcast-embeds';
import { DiscordRestClient, isNotFoundError } from './discord-rest.client';
import { ActiveBroadcastsStateDto } from './dto/active-broadcasts-state.dto';
import { ActiveBroadcastsState, BroadcastMessage } from './interfaces/active-broadcasts.interface';

function emptyState(): ActiveBroadcastsState {
  return { statusMessageId: null, messages: [] };
}

/**
 * Owns the Discord side of the tracker: one message per live broadcast plus a summary
 * message linking to all of them. Every operation holds the same lock, so the state file
 * always matches what was last sent to Discord.
 */
@Injectable()
export class ActiveBroadcastsService {
  private readonly logger = new Logger(ActiveBroadcastsService.name);
  private readonly mutex = new Mutex();
  private readonly filePath: string;
  private readonly channelId: string;
  private readonly guildId: string;
  private readonly style: EmbedStyle;
  private state: ActiveBroadcastsState = emptyState();
  private lastSummaryContent: string | null = null;

  constructor(
    configService: ConfigService,
    private readonly discordClient: DiscordRestClient,
    private readonly clock: Clock,
  ) {
    this.filePath = path.resolve(
      configService.get<string>('NOW_LIVE_ACTIVE_BROADCASTS_FILE') ?? 'ActiveBroadcasts.json',
    );
    this.channelId = configService.getOrThrow<string>('DISCORD_CHANNEL_ID');
    this.guildId = configService.getOrThrow<string>('DISCORD_GUILD_ID');
    this.style = {
      onlineColor: configService.get<number>('NOW_LIVE_ONLINE_COLOR') ?? 0x9146ff,
      offlineColor: configService.get<number>('NOW_LIVE_OFFLINE_COLOR') ?? 0x747f8d,
      footerIcon: configService.get<string>('NOW_LIVE_FOOTER_ICON'),
    };
  }

  get statusMessageId(): string | null {
    return this.state.statusMessageId;
  }

  get trackedMessages(): BroadcastMessage[] {
    return this.state.messages.map((message) => ({ ...message }));
  }

  isMessageTracked(userId: string): boolean {
    return this.state.messages.some((message) => message.userId === userId);
  }

  /**
   * Restore the messages posted before the last shutdown
   */
  async loadData(signal?: AbortSignal): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.lastSummaryContent = null;
      try {
        const raw = await readJsonFile(this.filePath, signal);
        if (raw === undefined) {
          this.logger.log(`📂 No active broadcasts found at ${this.filePath}`);
          this.state = emptyState();
          return;
        }

        const snapshot = toValidatedInstance(ActiveBroadcastsStateDto, raw);
        this.state = {
          statusMessageId: snapshot.statusMessageId ?? null,
          messages: snapshot.messages.map((message) => ({
            messageId: message.messageId,
            userId: message.userId,
            login: message.login,
            displayName: message.displayName,
            previewUpdatedAt: message.previewUpdatedAt,
          })),
        };
        this.logger.log(`✅ Loaded ${this.state.messages.length} active broadcasts from ${this.filePath}`);
      } catch (error) {
        if (isAbortError(error)) {
          throw error;
        }
        this.logger.error(`❌ Could not read active broadcasts ${this.filePath}: ${errorMessage(error)}`);
        this.state = emptyState();
      }
    });
  }

  /**
   * Make sure the summary message exists and shows the current state
   */
  async ensureStatusMessageExists(signal?: AbortSignal): Promise<void> {
    await this.mutex.runExclusive(async () => {
      await this.writeSummary(signal, true);
      await this.saveData(signal);
    });
  }

  async createBroadcastMessage(streamer: TrackedStreamer, signal?: AbortSignal): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const existing = this.findMessage(streamer.id);
      if (existing) {
        await this.editBroadcastMessage(existing, streamer, signal);
      } else {
        await this.postBroadcastMessage(streamer, signal);
      }
      await this.saveData(signal);
    });
  }

  /**
   * Refresh the live message of a streamer. `refreshMedia` swaps the preview image for a new capture.
   */
  async updateBroadcastMessage(streamer: TrackedStreamer, signal?: AbortSignal, refreshMedia = false): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const existing = this.findMessage(streamer.id);
      if (!existing) {
        await this.postBroadcastMessage(streamer, signal);
      } else {
        if (refreshMedia) {
          existing.previewUpdatedAt = this.clock.now();
        }
        await this.editBroadcastMessage(existing, streamer, signal);
      }
      await this.saveData(signal);
    });
  }

  /**
   * Announce the end of a broadcast and take its live message down
   */
  async endBroadcastMessage(streamer: TrackedStreamer, signal?: AbortSignal): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const existing = this.findMessage(streamer.id);
      if (!existing) {
        this.logger.warn(`⚠️ No live message tracked for ${streamer.displayName} (${streamer.id}), skipping`);
        return;
      }

      await this.discordClient.createMessage(
        this.channelId,
        { embeds: [buildEndedEmbed(streamer, this.style, this.clock.now())] },
        signal,
      );
      // Ended is not delivered twice: untrack whatever the delete outcome
      let deleteFailure: { error: unknown } | null = null;
      try {
        await this.deleteQuietly(existing.messageId, signal);
      } catch (error) {
        deleteFailure = { error };
        this.logger.error(
          `❌ Could not delete live message ${existing.messageId} of ${streamer.displayName}, leaving it orphaned: ${errorMessage(error)}`,
        );
      }
      this.untrack(streamer.id);
      await this.saveData(signal);
      this.logger.log(`📴 ${streamer.displayName} finished streaming`);

      if (deleteFailure) {
        throw deleteFailure.error;
      }
    });
  }

  /**
   * Take down the live message of a streamer that is no longer tracked, without announcing anything
   */
  async discardBroadcastMessage(userId: string, signal?: AbortSignal): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const existing = this.findMessage(userId);
      if (!existing) {
        return;
      }
      await this.deleteQuietly(existing.messageId, signal);
      this.untrack(userId);
      await this.saveData(signal);
    });
  }

  async updateSummary(signal?: AbortSignal): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const changed = await this.writeSummary(signal, false);
      if (changed) {
        await this.saveData(signal);
      }
    });
  }

  private findMessage(userId: string): BroadcastMessage | undefined {
    return this.state.messages.find((message) => message.userId === userId);
  }

  private untrack(userId: string) {
    this.state.messages = this.state.messages.filter((message) => message.userId !== userId);
  }

  private async postBroadcastMessage(streamer: TrackedStreamer, signal?: AbortSignal): Promise<void> {
    const now = this.clock.now();
    const message = await this.discordClient.createMessage(
      this.channelId,
      { embeds: [buildLiveEmbed(streamer, this.style, now, now)] },
      signal,
    );

    this.state.messages.push({
      messageId: message.id,
      userId: streamer.id,
      login: streamer.login,
      displayName: streamer.displayName,
      previewUpdatedAt: now,
    });
    this.logger.log(`🔴 ${streamer.displayName} is live, posted message ${message.id}`);
  }

  private async editBroadcastMessage(
    existing: BroadcastMessage,
    streamer: TrackedStreamer,
    signal?: AbortSignal,
  ): Promise<void> {
    existing.login = streamer.login;
    existing.displayName = streamer.displayName;
    const embed = buildLiveEmbed(streamer, this.style, this.clock.now(), existing.previewUpdatedAt);

    try {
      await this.discordClient.editMessage(this.channelId, existing.messageId, { embeds: [embed] }, signal);
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw error;
      }
      this.logger.warn(`⚠️ Live message of ${streamer.displayName} was deleted, posting it again`);
      const message = await this.discordClient.createMessage(this.channelId, { embeds: [embed] }, signal);
      existing.messageId = message.id;
    }
  }

  private async deleteQuietly(messageId: string, signal?: AbortSignal): Promise<void> {
    try {
      await this.discordClient.deleteMessage(this.channelId, messageId, signal);
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw error;
      }
      this.logger.warn(`⚠️ Message ${messageId} was already deleted`);
    }
  }

  /**
   * Edit the summary message, posting a new one when it is missing.
   * Returns whether anything was sent to Discord.
   */
  private async writeSummary(signal: AbortSignal | undefined, force: boolean): Promise<boolean> {
    const content = buildSummaryContent(this.state.messages, this.guildId, this.channelId);
    const statusMessageId = this.state.statusMessageId;

    if (statusMessageId && !force && content === this.lastSummaryContent) {
      return false;
    }

    if (statusMessageId) {
      try {
        await this.discordClient.editMessage(this.channelId, statusMessageId, { content, embeds: [] }, signal);
        this.lastSummaryContent = content;
        this.logger.debug('📝 Summary message updated');
        return true;
      } catch (error) {
        if (!isNotFoundError(error)) {
          throw error;
        }
        this.logger.warn('⚠️ Existing summary message was not found, posting a new one');
      }
    }

    const message = await this.discordClient.createMessage(this.channelId, { content }, signal);
    this.state.statusMessageId = message.id;
    this.lastSummaryContent = content;
    this.logger.log(`📝 Summary message created (${message.id})`);
    return true;
  }

  private async saveData(signal?: AbortSignal): Promise<void> {
    try {
      await writeJsonFileAtomic(this.filePath, this.state, signal);
    } catch (error) {
      if (!isAbortError(error)) {
        this.logger.error(`❌ Failed to save active broadcasts ${this.filePath}: ${errorMessage(error)}`);
      }
      throw error;
    }
  }
}
