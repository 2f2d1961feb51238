import { Injectable, Logger } from '@nestjs/common';
import { UserLookup } from '../now-live/interfaces/user-lookup';
import { UserProfile } from '../now-live/interfaces/tracked-streamer.interface';
import { errorMessage, isAbortError } from '../utils/abort.util';
import { HelixResponse, HelixUser } from './interfaces/helix.interface';
import { TwitchHelixClient } from './twitch-helix.client';

@Injectable()
export class TwitchUsersService extends UserLookup {
  private readonly logger = new Logger(TwitchUsersService.name);

  constructor(private readonly helixClient: TwitchHelixClient) {
    super();
  }

  /**
   * Resolve a login to its Twitch profile. Failures are logged and reported as `null`.
   */
  async findByLogin(login: string, signal?: AbortSignal): Promise<UserProfile | null> {
    const params = new URLSearchParams({ login });

    try {
      const response = await this.helixClient.get<HelixResponse<HelixUser>>('/users', params, signal);
      const user = response.data[0];
      if (!user) {
        this.logger.warn(`⚠️ Twitch user "${login}" not found`);
        return null;
      }

      return {
        id: user.id,
        login: user.login,
        displayName: user.display_name,
        profileImageUrl: user.profile_image_url,
      };
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      this.logger.error(`❌ Failed to fetch Twitch user "${login}": ${errorMessage(error)}`);
      return null;
    }
  }
}
