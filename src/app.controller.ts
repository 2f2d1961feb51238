import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { NowLiveService } from './now-live/now-live.service';

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  trackedStreamers: number;
  liveStreamers: number;
}

@ApiTags('health')
@Controller()
export class AppController {
  constructor(private readonly nowLiveService: NowLiveService) {}

  @Get('health')
  @ApiOperation({ summary: 'Liveness probe with tracker counters' })
  @ApiResponse({ status: 200, description: 'Service is up' })
  health(): HealthResponse {
    const streamers = this.nowLiveService.getUsers();
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      trackedStreamers: streamers.length,
      liveStreamers: streamers.filter((streamer) => streamer.isLive).length,
    };
  }
}
