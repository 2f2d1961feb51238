import { Module } from '@nestjs/common';
import { StreamStatusSource } from '../now-live/interfaces/stream-status-source';
import { UserLookup } from '../now-live/interfaces/user-lookup';
import { TokenRefreshScheduler } from './token-refresh.scheduler';
import { TwitchAuthService } from './twitch-auth.service';
import { TwitchHelixClient } from './twitch-helix.client';
import { TwitchStreamsService } from './twitch-streams.service';
import { TwitchUsersService } from './twitch-users.service';

@Module({
  providers: [
    TwitchAuthService,
    TwitchHelixClient,
    TwitchStreamsService,
    TwitchUsersService,
    TokenRefreshScheduler,
    { provide: StreamStatusSource, useExisting: TwitchStreamsService },
    { provide: UserLookup, useExisting: TwitchUsersService },
  ],
  exports: [StreamStatusSource, UserLookup, TwitchAuthService],
})
export class TwitchModule {}
