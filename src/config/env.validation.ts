import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsPort,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export enum Environment {
  Development = 'development',
  Production = 'production',
  Staging = 'staging',
  Test = 'test',
}

export class EnvironmentVariables {
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.Development;

  @IsPort()
  PORT: string = '8080';

  @IsString()
  @IsNotEmpty()
  TWITCH_CLIENT_ID!: string;

  @IsString()
  @IsNotEmpty()
  TWITCH_CLIENT_SECRET!: string;

  @IsString()
  @IsNotEmpty()
  DISCORD_BOT_TOKEN!: string;

  @IsString()
  @IsNotEmpty()
  DISCORD_GUILD_ID!: string;

  @IsString()
  @IsNotEmpty()
  DISCORD_CHANNEL_ID!: string;

  @IsString()
  @IsNotEmpty()
  NOW_LIVE_USER_DATA_FILE: string = 'NowLiveUserData.json';

  @IsString()
  @IsNotEmpty()
  NOW_LIVE_ACTIVE_BROADCASTS_FILE: string = 'ActiveBroadcasts.json';

  // Seconds between two polls of the streams endpoint
  @IsInt()
  @Min(5)
  NOW_LIVE_UPDATE_INTERVAL: number = 60;

  // Minutes between two preview image refreshes of a live broadcast
  @IsInt()
  @Min(1)
  NOW_LIVE_MEDIA_REFRESH_INTERVAL: number = 6;

  // Helix accepts at most 100 user_id values per request
  @IsInt()
  @Min(1)
  @Max(100)
  NOW_LIVE_MAX_USERS_PER_REQUEST: number = 100;

  @IsInt()
  @Min(0)
  @Max(0xffffff)
  NOW_LIVE_ONLINE_COLOR: number = 0x9146ff;

  @IsInt()
  @Min(0)
  @Max(0xffffff)
  NOW_LIVE_OFFLINE_COLOR: number = 0x747f8d;

  @IsOptional()
  @IsUrl()
  NOW_LIVE_FOOTER_ICON?: string;

  @IsOptional()
  @IsString()
  ADMIN_TOKEN?: string;

  @IsOptional()
  @IsString()
  SENTRY_DSN?: string;
}

/**
 * Used as `ConfigModule.forRoot({ validate })`: converts the raw environment
 * and fails startup listing every invalid variable.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration - ${details}`);
  }
  return validatedConfig;
}
