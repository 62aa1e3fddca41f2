import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import Decimal from 'decimal.js';
import { UpstreamParseError } from '../common/errors/upstream-parse.error';
import { parseDecimal } from '../common/utils/decimal.util';
import { BuilderTradeDto } from './dto/builder-trade.dto';
import { BuilderTrade, BuilderTradesPage } from './entities/builder-trade.entity';

// Up to 11 integer digits are seconds, 12-13 are milliseconds.
const UNIX_SECONDS = /^\d{1,11}(\.\d+)?$/;
const UNIX_MILLIS = /^\d{12,13}$/;
const ISO_8601 = /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/i;
const HAS_ZONE = /(Z|[+-]\d{2}:\d{2})$/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accepts ISO-8601 strings and unix timestamps in seconds or milliseconds.
 * ISO date-times without a zone are read as UTC. Anything else, or a
 * value outside the Date range, is undefined.
 */
export function parseMatchTime(raw: string): Date | undefined {
  const text = raw.trim();
  let time: number;

  if (UNIX_SECONDS.test(text)) {
    time = Number(text) * 1000;
  } else if (UNIX_MILLIS.test(text)) {
    time = Number(text);
  } else if (ISO_8601.test(text)) {
    const iso = text.replace(' ', 'T');
    time = Date.parse(iso.includes('T') && !HAS_ZONE.test(iso) ? `${iso}Z` : iso);
  } else {
    return undefined;
  }

  const date = new Date(time);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

// Prefers the provided USDC notional; falls back to price x size.
function resolveVolume(dto: BuilderTradeDto): Decimal | undefined {
  const notional = parseDecimal(dto.sizeUsdc);
  if (notional) {
    return notional;
  }
  const price = parseDecimal(dto.price);
  const size = parseDecimal(dto.size);
  return price && size ? price.times(size) : undefined;
}

/**
 * Validates one raw record into a typed trade.
 * @throws UpstreamParseError on missing fields, bad timestamps or missing volume
 */
export function parseBuilderTrade(raw: unknown, index: number): BuilderTrade {
  if (!isRecord(raw)) {
    throw new UpstreamParseError(`Trade record ${index} is not an object`);
  }

  const dto = plainToInstance(BuilderTradeDto, raw);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    const details = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new UpstreamParseError(`Trade record ${index} is invalid: ${details.join('; ')}`, details);
  }

  const matchTime = parseMatchTime(dto.matchTime);
  if (!matchTime) {
    throw new UpstreamParseError(`Trade record ${index} has unparseable matchTime "${dto.matchTime}"`);
  }

  const volume = resolveVolume(dto);
  if (!volume) {
    throw new UpstreamParseError(`Trade record ${index} has neither sizeUsdc nor price and size`);
  }
  if (volume.isNegative()) {
    throw new UpstreamParseError(`Trade record ${index} has negative volume ${volume.toString()}`);
  }

  const transactionHash = dto.transactionHash?.trim();

  return {
    id: dto.id,
    owner: dto.owner.trim().toLowerCase(),
    matchTime,
    volume,
    ...(transactionHash ? { transactionHash } : {}),
  };
}

/**
 * Normalizes one response of the trades endpoint.
 * Paged form: `{ data, next_cursor }` (or `trades` / `nextCursor`).
 * A bare array is a single, final page.
 */
export function parseTradesPage(payload: unknown): BuilderTradesPage {
  if (Array.isArray(payload)) {
    return { trades: payload.map(parseBuilderTrade) };
  }

  if (!isRecord(payload)) {
    throw new UpstreamParseError('Trades response is not a JSON object or array');
  }

  const records = payload.data ?? payload.trades;
  if (!Array.isArray(records)) {
    throw new UpstreamParseError('Trades response has no data array');
  }

  const cursor = payload.next_cursor ?? payload.nextCursor;
  if (cursor !== undefined && cursor !== null && typeof cursor !== 'string') {
    throw new UpstreamParseError('Trades response has a non-string next_cursor');
  }

  const trades = records.map(parseBuilderTrade);
  return typeof cursor === 'string' && cursor !== '' ? { trades, nextCursor: cursor } : { trades };
}
