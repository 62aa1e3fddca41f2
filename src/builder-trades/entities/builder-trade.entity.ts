import Decimal from 'decimal.js';

// One validated fill attributed to the builder account.
// Read-only per request, never persisted.
export interface BuilderTrade {
  readonly id: string;
  readonly owner: string;             // lower-cased wallet address
  readonly matchTime: Date;           // UTC
  readonly volume: Decimal;           // USDC notional
  readonly transactionHash?: string;
}

// One page of trades plus the cursor for the next request.
export interface BuilderTradesPage {
  trades: BuilderTrade[];
  nextCursor?: string;
}
