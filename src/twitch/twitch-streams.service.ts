import { Injectable, Logger } from '@nestjs/common';
import { StreamStatusSource } from '../now-live/interfaces/stream-status-source';
import { LiveStream } from '../now-live/interfaces/tracked-streamer.interface';
import { HelixResponse, HelixStream } from './interfaces/helix.interface';
import { TwitchHelixClient } from './twitch-helix.client';

export const MAX_IDS_PER_REQUEST = 100;

@Injectable()
export class TwitchStreamsService extends StreamStatusSource {
  private readonly logger = new Logger(TwitchStreamsService.name);

  constructor(private readonly helixClient: TwitchHelixClient) {
    super();
  }

  /**
   * Get the live streams of up to 100 broadcasters, following pagination until exhausted.
   * Docs: https://dev.twitch.tv/docs/api/reference/#get-streams
   */
  async getLiveStreams(userIds: readonly string[], signal?: AbortSignal): Promise<LiveStream[]> {
    if (userIds.length > MAX_IDS_PER_REQUEST) {
      throw new RangeError(`Maximum of ${MAX_IDS_PER_REQUEST} user ids allowed per request, got ${userIds.length}`);
    }
    if (userIds.length === 0) {
      return [];
    }

    const streams: LiveStream[] = [];
    let cursor: string | undefined;

    do {
      const params = new URLSearchParams();
      userIds.forEach((id) => params.append('user_id', id));
      params.append('type', 'live');
      params.append('first', String(MAX_IDS_PER_REQUEST));
      if (cursor) {
        params.append('after', cursor);
      }

      const page = await this.helixClient.get<HelixResponse<HelixStream>>('/streams', params, signal);
      streams.push(...page.data.map((stream) => this.toLiveStream(stream)));
      cursor = page.pagination?.cursor || undefined;
    } while (cursor);

    this.logger.debug(`📺 ${streams.length}/${userIds.length} streamers live`);
    return streams;
  }

  private toLiveStream(stream: HelixStream): LiveStream {
    return {
      userId: stream.user_id,
      broadcast: {
        title: stream.title,
        categoryId: stream.game_id,
        categoryName: stream.game_name,
        viewerCount: stream.viewer_count,
        startedAt: new Date(stream.started_at),
        thumbnailUrl: stream.thumbnail_url,
        language: stream.language,
      },
    };
  }
}
