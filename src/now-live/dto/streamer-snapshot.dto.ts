import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsDate,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';

export class BroadcastSnapshotDto {
  @ApiProperty({ description: 'Stream title' })
  @IsString()
  title!: string;

  @ApiProperty({ description: 'Twitch category (game) id' })
  @IsString()
  categoryId!: string;

  @ApiProperty({ description: 'Twitch category (game) name' })
  @IsString()
  categoryName!: string;

  @ApiProperty({ description: 'Viewers at the last poll' })
  @IsInt()
  @Min(0)
  viewerCount!: number;

  @ApiProperty({ description: 'When the broadcast began', type: String, format: 'date-time' })
  @Type(() => Date)
  @IsDate()
  startedAt!: Date;

  @ApiProperty({ description: 'Thumbnail URL with {width}x{height} placeholders', required: false })
  @IsOptional()
  @IsString()
  thumbnailUrl?: string;

  @ApiProperty({ description: 'Stream language (ISO 639-1 or "other")', required: false })
  @IsOptional()
  @IsString()
  language?: string;
}

/**
 * One entry of the persisted roster file, also the shape returned by the operator API.
 */
export class StreamerSnapshotDto {
  @ApiProperty({ description: 'Twitch user id' })
  @IsString()
  @IsNotEmpty()
  id!: string;

  @ApiProperty({ description: 'Twitch login' })
  @IsString()
  @IsNotEmpty()
  login!: string;

  @ApiProperty({ description: 'Twitch display name' })
  @IsString()
  displayName!: string;

  @ApiProperty({ description: 'Profile picture URL' })
  @IsString()
  profileImageUrl!: string;

  @ApiProperty({ description: 'Whether the streamer was live at the last poll' })
  @IsBoolean()
  isLive!: boolean;

  @ApiProperty({ description: 'When the current broadcast was first seen', type: String, format: 'date-time', nullable: true })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  lastOnline?: Date | null;

  @ApiProperty({ description: 'When the preview image is refreshed next', type: String, format: 'date-time', nullable: true })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  nextMediaRefreshAt?: Date | null;

  @ApiProperty({ description: 'Current broadcast, null while offline', type: BroadcastSnapshotDto, nullable: true })
  @IsOptional()
  @ValidateNested()
  @Type(() => BroadcastSnapshotDto)
  broadcast?: BroadcastSnapshotDto | null;
}
