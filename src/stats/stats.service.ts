import { Injectable, Logger } from '@nestjs/common';
import { BuilderTradesClient } from '../builder-trades/builder-trades.client';
import { StatsResponseDto } from './dto/stats-response.dto';
import { computeStats } from './stats.aggregator';

// Fetch-then-reduce for one request. Nothing is cached between calls.
@Injectable()
export class StatsService {
  private readonly logger = new Logger(StatsService.name);

  constructor(private readonly tradesClient: BuilderTradesClient) {}

  /**
   * Builds a fresh snapshot over the full trade history.
   * Upstream failures propagate as gateway exceptions; no partial snapshot is returned.
   */
  async getStats(windowHours: number, now: Date = new Date()): Promise<StatsResponseDto> {
    const trades = await this.tradesClient.fetchAllTrades();
    const stats = computeStats(trades, windowHours, now);

    this.logger.log(
      `Aggregated ${stats.totalTrades} trades over ${stats.daily.length} day(s); ` +
        `${stats.windowTrades} in the last ${windowHours}h`,
    );
    return stats;
  }
}
