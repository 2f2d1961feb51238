import {
  Body,
  ConflictException,
  Controller,
  Delete,
  Get,
  InternalServerErrorException,
  NotFoundException,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AddStreamerDto } from './dto/add-streamer.dto';
import { StreamerSnapshotDto } from './dto/streamer-snapshot.dto';
import { ADMIN_TOKEN_HEADER, AdminTokenGuard } from './guards/admin-token.guard';
import { TrackedStreamer } from './interfaces/tracked-streamer.interface';
import { NowLiveService, UserManagementResult } from './now-live.service';

export interface UserManagementResponse {
  login: string;
  result: keyof typeof UserManagementResult;
}

@ApiTags('now-live')
@ApiHeader({ name: ADMIN_TOKEN_HEADER, required: false, description: 'Required when ADMIN_TOKEN is configured' })
@UseGuards(AdminTokenGuard)
@Controller('now-live/streamers')
export class NowLiveController {
  constructor(private readonly nowLiveService: NowLiveService) {}

  @Get()
  @ApiOperation({ summary: 'List tracked streamers with their live state' })
  @ApiResponse({ status: 200, description: 'Tracked streamers', type: [StreamerSnapshotDto] })
  findAll(): TrackedStreamer[] {
    return this.nowLiveService.getUsers();
  }

  @Post()
  @ApiOperation({ summary: 'Start tracking a Twitch streamer' })
  @ApiResponse({ status: 201, description: 'Streamer added' })
  @ApiResponse({ status: 404, description: 'Twitch login not found' })
  @ApiResponse({ status: 409, description: 'Streamer already tracked' })
  async add(@Body() addStreamerDto: AddStreamerDto): Promise<UserManagementResponse> {
    const { login } = addStreamerDto;
    const result = await this.nowLiveService.addUser(login);

    switch (result) {
      case UserManagementResult.NotFound:
        throw new NotFoundException(`Twitch user "${login}" not found`);
      case UserManagementResult.AlreadyExists:
        throw new ConflictException(`Twitch user "${login}" is already tracked`);
      case UserManagementResult.Error:
        throw new InternalServerErrorException(`Could not add "${login}"`);
      case UserManagementResult.Success:
        return { login, result: 'Success' };
    }
  }

  @Delete(':login')
  @ApiOperation({ summary: 'Stop tracking a streamer by login' })
  @ApiResponse({ status: 200, description: 'Streamer removed' })
  @ApiResponse({ status: 404, description: 'Streamer not tracked' })
  async remove(@Param('login') login: string): Promise<UserManagementResponse> {
    const result = await this.nowLiveService.removeUser(login);

    switch (result) {
      case UserManagementResult.NotFound:
        throw new NotFoundException(`Twitch user "${login}" is not tracked`);
      case UserManagementResult.AlreadyExists:
      case UserManagementResult.Error:
        throw new InternalServerErrorException(`Could not remove "${login}"`);
      case UserManagementResult.Success:
        return { login, result: 'Success' };
    }
  }
}
