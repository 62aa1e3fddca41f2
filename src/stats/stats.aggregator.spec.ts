import Decimal from 'decimal.js';
import { BuilderTrade } from '../builder-trades/entities/builder-trade.entity';
import { DailyBucketDto, StatsResponseDto, WeeklyBucketDto } from './dto/stats-response.dto';
import { computeStats } from './stats.aggregator';

describe('computeStats', () => {
  let idCounter = 1;

  const makeTrade = (
    owner: string,
    at: string,
    volume: string | number,
    transactionHash: string | null = `0xtx${idCounter}`,
  ): BuilderTrade => ({
    id: `trade-${idCounter++}`,
    owner,
    matchTime: new Date(at),
    volume: new Decimal(volume),
    ...(transactionHash ? { transactionHash } : {}),
  });

  const now = new Date('2024-03-02T18:00:00Z');

  beforeEach(() => {
    idCounter = 1;
  });

  it('should aggregate totals, window and daily buckets', () => {
    const trades = [
      makeTrade('0xa', '2024-03-01T09:00:00Z', 10),
      makeTrade('0xb', '2024-03-01T15:00:00Z', 5),
      makeTrade('0xa', '2024-03-02T12:00:00Z', 3),
    ];

    const stats = computeStats(trades, 12, now);

    expect(stats.totalTrades).toBe(3);
    expect(stats.totalVolume).toBe(18);
    expect(stats.uniqueUsers).toBe(2);
    expect(stats.windowTrades).toBe(1);
    expect(stats.windowVolume).toBe(3);
    expect(stats.windowUsers).toBe(1);
    expect(stats.daily).toEqual([
      { date: '2024-03-01', volume: 15, trades: 2, uniqueUsers: 2, uniqueTxs: 2 },
      { date: '2024-03-02', volume: 3, trades: 1, uniqueUsers: 1, uniqueTxs: 1 },
    ]);
  });

  it('should build the snapshot and buckets as response DTO instances', () => {
    const stats = computeStats([makeTrade('0xa', '2024-03-01T09:00:00Z', 10)], 24, now);

    expect(stats).toBeInstanceOf(StatsResponseDto);
    expect(stats.daily[0]).toBeInstanceOf(DailyBucketDto);
    expect(stats.weekly[0]).toBeInstanceOf(WeeklyBucketDto);
    expect(stats.weekly[0].week).toBe('2024-W09');
  });

  it('should return zeros and empty buckets for an empty history', () => {
    const stats = computeStats([], 24, now);

    expect(stats).toEqual({
      generatedAt: '2024-03-02T18:00:00.000Z',
      windowHours: 24,
      windowStart: '2024-03-01T18:00:00.000Z',
      windowEnd: '2024-03-02T18:00:00.000Z',
      totalVolume: 0,
      totalTrades: 0,
      uniqueUsers: 0,
      uniqueTxs: 0,
      windowVolume: 0,
      windowTrades: 0,
      windowUsers: 0,
      windowTxs: 0,
      daily: [],
      weekly: [],
    });
  });

  it('should count each user once regardless of trade count', () => {
    const trades = [
      makeTrade('0xa', '2024-03-01T01:00:00Z', 1),
      makeTrade('0xa', '2024-03-01T02:00:00Z', 1),
      makeTrade('0xa', '2024-03-02T03:00:00Z', 1),
      makeTrade('0xb', '2024-03-02T04:00:00Z', 1),
    ];

    const stats = computeStats(trades, 24, now);

    expect(stats.uniqueUsers).toBe(2);
    expect(stats.totalTrades).toBe(4);
  });

  it('should count fills sharing a transaction once in uniqueTxs', () => {
    const trades = [
      makeTrade('0xa', '2024-03-02T10:00:00Z', 1, '0xsame'),
      makeTrade('0xb', '2024-03-02T10:00:00Z', 1, '0xsame'),
      makeTrade('0xc', '2024-03-02T11:00:00Z', 1, null),
    ];

    const stats = computeStats(trades, 24, now);

    expect(stats.uniqueTxs).toBe(1);
    expect(stats.windowTxs).toBe(1);
    expect(stats.daily[0].uniqueTxs).toBe(1);
  });

  it('should include a trade exactly at the window start', () => {
    const stats = computeStats([makeTrade('0xa', '2024-03-02T06:00:00Z', 2)], 12, now);

    expect(stats.windowTrades).toBe(1);
    expect(stats.windowStart).toBe('2024-03-02T06:00:00.000Z');
  });

  it('should exclude trades before the window and after now', () => {
    const trades = [
      makeTrade('0xa', '2024-03-02T05:59:59Z', 2),
      makeTrade('0xb', '2024-03-02T18:00:01Z', 4),
    ];

    const stats = computeStats(trades, 12, now);

    expect(stats.windowTrades).toBe(0);
    expect(stats.windowVolume).toBe(0);
    expect(stats.totalTrades).toBe(2);
    expect(stats.totalVolume).toBe(6);
  });

  it('should sort buckets ascending without duplicates for unordered input', () => {
    const trades = [
      makeTrade('0xa', '2024-03-02T10:00:00Z', 1),
      makeTrade('0xa', '2024-02-20T10:00:00Z', 1),
      makeTrade('0xa', '2024-03-01T10:00:00Z', 1),
      makeTrade('0xa', '2024-02-20T11:00:00Z', 1),
    ];

    const stats = computeStats(trades, 24, now);

    expect(stats.daily.map((d) => d.date)).toEqual(['2024-02-20', '2024-03-01', '2024-03-02']);
    expect(stats.weekly.map((w) => w.week)).toEqual(['2024-W08', '2024-W09']);
  });

  it('should keep daily sums equal to the totals', () => {
    const trades = [
      makeTrade('0xa', '2024-02-28T10:00:00Z', '0.1'),
      makeTrade('0xb', '2024-02-29T10:00:00Z', '0.2'),
      makeTrade('0xc', '2024-03-01T10:00:00Z', '1234.567891'),
      makeTrade('0xa', '2024-03-02T10:00:00Z', '0.000001'),
    ];

    const stats = computeStats(trades, 720, now);

    const dailyTrades = stats.daily.reduce((sum, d) => sum + d.trades, 0);
    const dailyVolume = stats.daily.reduce((sum, d) => sum + d.volume, 0);
    expect(dailyTrades).toBe(stats.totalTrades);
    expect(dailyVolume).toBeCloseTo(stats.totalVolume, 6);
    expect(stats.windowTrades).toBeLessThanOrEqual(stats.totalTrades);
    expect(stats.windowVolume).toBeLessThanOrEqual(stats.totalVolume);
  });

  it('should sum volumes with decimal precision', () => {
    const trades = [
      makeTrade('0xa', '2024-03-02T10:00:00Z', '0.1'),
      makeTrade('0xb', '2024-03-02T11:00:00Z', '0.2'),
    ];

    expect(computeStats(trades, 24, now).totalVolume).toBe(0.3);
  });

  it('should bucket by ISO week', () => {
    const trades = [
      makeTrade('0xa', '2024-02-26T10:00:00Z', 4), // Monday, W09
      makeTrade('0xb', '2024-03-01T10:00:00Z', 6), // Friday, W09
      makeTrade('0xa', '2024-03-04T00:00:00Z', 1), // Monday, W10
    ];

    const stats = computeStats(trades, 24, new Date('2024-03-05T00:00:00Z'));

    expect(stats.weekly).toEqual([
      { week: '2024-W09', volume: 10, trades: 2, uniqueUsers: 2, uniqueTxs: 2 },
      { week: '2024-W10', volume: 1, trades: 1, uniqueUsers: 1, uniqueTxs: 1 },
    ]);
  });
});
