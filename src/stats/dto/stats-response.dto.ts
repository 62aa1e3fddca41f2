// Figures shared by every slice of the history
export interface BucketFigures {
  volume: number;         // USDC
  trades: number;
  uniqueUsers: number;
  uniqueTxs: number;
}

// Trades and volume for one UTC calendar day
export class DailyBucketDto {
  date: string;           // "2024-03-01"
  volume: number;
  trades: number;
  uniqueUsers: number;
  uniqueTxs: number;

  constructor(date: string, figures: BucketFigures) {
    this.date = date;
    this.volume = figures.volume;
    this.trades = figures.trades;
    this.uniqueUsers = figures.uniqueUsers;
    this.uniqueTxs = figures.uniqueTxs;
  }
}

// Same figures for one ISO week
export class WeeklyBucketDto {
  week: string;           // "2024-W09"
  volume: number;
  trades: number;
  uniqueUsers: number;
  uniqueTxs: number;

  constructor(week: string, figures: BucketFigures) {
    this.week = week;
    this.volume = figures.volume;
    this.trades = figures.trades;
    this.uniqueUsers = figures.uniqueUsers;
    this.uniqueTxs = figures.uniqueTxs;
  }
}

// Snapshot returned by GET /api/stats. Recomputed on every request.
export class StatsResponseDto {
  generatedAt: string;
  windowHours: number;
  windowStart: string;
  windowEnd: string;

  totalVolume: number;
  totalTrades: number;
  uniqueUsers: number;
  uniqueTxs: number;

  windowVolume: number;   // trades with windowStart <= matchTime <= windowEnd
  windowTrades: number;
  windowUsers: number;
  windowTxs: number;

  daily: DailyBucketDto[];    // ascending by date
  weekly: WeeklyBucketDto[];  // ascending by week

  constructor(init: StatsResponseDto) {
    this.generatedAt = init.generatedAt;
    this.windowHours = init.windowHours;
    this.windowStart = init.windowStart;
    this.windowEnd = init.windowEnd;
    this.totalVolume = init.totalVolume;
    this.totalTrades = init.totalTrades;
    this.uniqueUsers = init.uniqueUsers;
    this.uniqueTxs = init.uniqueTxs;
    this.windowVolume = init.windowVolume;
    this.windowTrades = init.windowTrades;
    this.windowUsers = init.windowUsers;
    this.windowTxs = init.windowTxs;
    this.daily = init.daily;
    this.weekly = init.weekly;
  }
}
