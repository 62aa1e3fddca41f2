import { Controller, Get, HttpCode, HttpStatus, Query } from '@nestjs/common';
import { StatsResponseDto } from './dto/stats-response.dto';
import { ParseHoursPipe } from './pipes/parse-hours.pipe';
import { StatsService } from './stats.service';

@Controller('api')
export class StatsController {
  constructor(private readonly statsService: StatsService) {}

  /**
   * Aggregated builder statistics.
   *
   * GET /api/stats?hours=24
   * @param hours - trailing window, defaults to 24, clamped to 720
   * @returns 200 with the snapshot; 502/504 when the upstream API fails
   */
  @Get('stats')
  @HttpCode(HttpStatus.OK)
  getStats(@Query('hours', ParseHoursPipe) hours: number): Promise<StatsResponseDto> {
    return this.statsService.getStats(hours);
  }
}
