import { Type } from 'class-transformer';
import { IsArray, IsDate, IsNotEmpty, IsOptional, IsString, ValidateNested } from 'class-validator';

export class BroadcastMessageDto {
  @IsString()
  @IsNotEmpty()
  messageId!: string;

  @IsString()
  @IsNotEmpty()
  userId!: string;

  @IsString()
  login!: string;

  @IsString()
  displayName!: string;

  @Type(() => Date)
  @IsDate()
  previewUpdatedAt!: Date;
}

export class ActiveBroadcastsStateDto {
  @IsOptional()
  @IsString()
  statusMessageId?: string | null;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => BroadcastMessageDto)
  messages!: BroadcastMessageDto[];
}
