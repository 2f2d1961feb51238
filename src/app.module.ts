import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { AppController } from './app.controller';
import { BroadcastsModule } from './broadcasts/broadcasts.module';
import { validate } from './config/env.validation';
import { NowLiveModule } from './now-live/now-live.module';
import { SentryModule } from './sentry/sentry.module';
import { TwitchModule } from './twitch/twitch.module';

@Module({
  imports: [
    ScheduleModule.forRoot(),
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate,
    }),
    SentryModule,
    TwitchModule,
    BroadcastsModule,
    NowLiveModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
