import { UserProfile } from './tracked-streamer.interface';

export abstract class UserLookup {
  /** Resolves to `null` when the login does not exist or could not be fetched. */
  abstract findByLogin(login: string, signal?: AbortSignal): Promise<UserProfile | null>;
}
