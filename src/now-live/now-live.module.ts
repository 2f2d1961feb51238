import { Module } from '@nestjs/common';
import { BroadcastsModule } from '../broadcasts/broadcasts.module';
import { SentryModule } from '../sentry/sentry.module';
import { TwitchModule } from '../twitch/twitch.module';
import { Clock } from '../utils/clock.service';
import { AdminTokenGuard } from './guards/admin-token.guard';
import { NowLiveController } from './now-live.controller';
import { NowLiveEventBus } from './now-live-event.bus';
import { NowLiveRunner } from './now-live.runner';
import { NowLiveService } from './now-live.service';
import { StreamerDataStore } from './streamer-data.store';

@Module({
  imports: [TwitchModule, BroadcastsModule, SentryModule],
  controllers: [NowLiveController],
  providers: [NowLiveService, NowLiveEventBus, NowLiveRunner, StreamerDataStore, AdminTokenGuard, Clock],
  exports: [NowLiveService],
})
export class NowLiveModule {}
