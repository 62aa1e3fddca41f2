import Decimal from 'decimal.js';
import { BuilderTrade } from '../builder-trades/entities/builder-trade.entity';
import { hoursBefore, isoWeekKey, utcDayKey } from '../common/utils/date.util';
import { ZERO, toNumber } from '../common/utils/decimal.util';
import {
  BucketFigures,
  DailyBucketDto,
  StatsResponseDto,
  WeeklyBucketDto,
} from './dto/stats-response.dto';

// Running totals for one slice of trades (all-time, window or a bucket).
class Tally {
  volume: Decimal = ZERO;
  trades = 0;
  readonly users = new Set<string>();
  readonly txs = new Set<string>();

  add(trade: BuilderTrade): void {
    this.volume = this.volume.plus(trade.volume);
    this.trades += 1;
    this.users.add(trade.owner);
    if (trade.transactionHash) {
      this.txs.add(trade.transactionHash);
    }
  }

  summary(): BucketFigures {
    return {
      volume: toNumber(this.volume),
      trades: this.trades,
      uniqueUsers: this.users.size,
      uniqueTxs: this.txs.size,
    };
  }
}

function tallyFor(buckets: Map<string, Tally>, key: string): Tally {
  let tally = buckets.get(key);
  if (!tally) {
    tally = new Tally();
    buckets.set(key, tally);
  }
  return tally;
}

// Keys are ISO dates / ISO weeks, so lexical order is chronological.
function sortedEntries(buckets: Map<string, Tally>): Array<[string, Tally]> {
  return Array.from(buckets.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Reduces the trade history into the dashboard snapshot.
 * Pure: the result depends only on the arguments. Order of `trades` does not matter.
 *
 * @param windowHours - trailing window ending at `now`
 */
export function computeStats(
  trades: readonly BuilderTrade[],
  windowHours: number,
  now: Date = new Date(),
): StatsResponseDto {
  const windowStart = hoursBefore(now, windowHours);
  const allTime = new Tally();
  const window = new Tally();
  const daily = new Map<string, Tally>();
  const weekly = new Map<string, Tally>();

  for (const trade of trades) {
    allTime.add(trade);
    tallyFor(daily, utcDayKey(trade.matchTime)).add(trade);
    tallyFor(weekly, isoWeekKey(trade.matchTime)).add(trade);

    const time = trade.matchTime.getTime();
    if (time >= windowStart.getTime() && time <= now.getTime()) {
      window.add(trade);
    }
  }

  const totals = allTime.summary();
  const recent = window.summary();

  const dailyBuckets = sortedEntries(daily).map(
    ([date, tally]) => new DailyBucketDto(date, tally.summary()),
  );
  const weeklyBuckets = sortedEntries(weekly).map(
    ([week, tally]) => new WeeklyBucketDto(week, tally.summary()),
  );

  return new StatsResponseDto({
    generatedAt: now.toISOString(),
    windowHours,
    windowStart: windowStart.toISOString(),
    windowEnd: now.toISOString(),
    totalVolume: totals.volume,
    totalTrades: totals.trades,
    uniqueUsers: totals.uniqueUsers,
    uniqueTxs: totals.uniqueTxs,
    windowVolume: recent.volume,
    windowTrades: recent.trades,
    windowUsers: recent.uniqueUsers,
    windowTxs: recent.uniqueTxs,
    daily: dailyBuckets,
    weekly: weeklyBuckets,
  });
}
