import { TrackedStreamer } from './interfaces/tracked-streamer.interface';

/**
 * The set of tracked streamers, keyed by Twitch user id.
 * Every operation completes synchronously, so none can interleave with another.
 */
export class StreamerRoster {
  private readonly streamers = new Map<string, TrackedStreamer>();

  get size(): number {
    return this.streamers.size;
  }

  /** Inserts the streamer unless its id is already tracked. */
  tryAdd(streamer: TrackedStreamer): boolean {
    if (this.streamers.has(streamer.id)) {
      return false;
    }
    this.streamers.set(streamer.id, streamer);
    return true;
  }

  tryRemove(id: string): TrackedStreamer | undefined {
    const streamer = this.streamers.get(id);
    if (streamer) {
      this.streamers.delete(id);
    }
    return streamer;
  }

  get(id: string): TrackedStreamer | undefined {
    return this.streamers.get(id);
  }

  findByLogin(login: string): TrackedStreamer | undefined {
    const wanted = login.toLowerCase();
    return this.values().find((streamer) => streamer.login.toLowerCase() === wanted);
  }

  ids(): string[] {
    return [...this.streamers.keys()];
  }

  values(): TrackedStreamer[] {
    return [...this.streamers.values()];
  }

  replaceAll(streamers: readonly TrackedStreamer[]): void {
    this.streamers.clear();
    streamers.forEach((streamer) => this.tryAdd(streamer));
  }
}
