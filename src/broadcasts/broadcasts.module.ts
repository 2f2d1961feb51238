import { Module } from '@nestjs/common';
import { SentryModule } from '../sentry/sentry.module';
import { Clock } from '../utils/clock.service';
import { ActiveBroadcastsService } from './active-broadcasts.service';
import { BroadcastStatesHandler } from './broadcast-states.handler';
import { DiscordRestClient } from './discord-rest.client';

@Module({
  imports: [SentryModule],
  providers: [DiscordRestClient, ActiveBroadcastsService, BroadcastStatesHandler, Clock],
  exports: [BroadcastStatesHandler],
})
export class BroadcastsModule {}
