import { LiveStream } from './tracked-streamer.interface';

/**
 * Reports which of the given accounts are live right now.
 * Accounts absent from the result are offline.
 */
export abstract class StreamStatusSource {
  /** Rejects when given more than 100 ids. */
  abstract getLiveStreams(userIds: readonly string[], signal?: AbortSignal): Promise<LiveStream[]>;
}
