import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, Matches } from 'class-validator';

export const TWITCH_LOGIN_PATTERN = /^[a-zA-Z0-9_]{3,25}$/;

export class AddStreamerDto {
  @ApiProperty({ description: 'Twitch login of the streamer to track', example: 'some_streamer' })
  @IsString()
  @IsNotEmpty()
  @Matches(TWITCH_LOGIN_PATTERN, { message: 'login must be a valid Twitch login' })
  login!: string;
}
