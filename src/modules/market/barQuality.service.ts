import moment from 'moment';
import { CleanResult, RawBar, RejectionCounts, RejectionReason, ValidatedBar } from './market.types';

export const BAR_TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

const PRICE_FIELDS = ['open', 'high', 'low', 'close'] as const;

// Plain decimal or exponent notation; Number() would also take 0x/0b/0o
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

type Coerced = { ok: true; value: number } | { ok: false; reason: 'missing' | 'malformed' };

const coerceNumber = (value: unknown): Coerced => {
  if (value === undefined || value === null) return { ok: false, reason: 'missing' };
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return { ok: false, reason: 'missing' };
    if (!DECIMAL_PATTERN.test(trimmed)) return { ok: false, reason: 'malformed' };
    const n = Number(trimmed);
    return Number.isFinite(n) ? { ok: true, value: n } : { ok: false, reason: 'malformed' };
  }
  if (typeof value === 'number' && Number.isFinite(value)) return { ok: true, value };
  return { ok: false, reason: 'malformed' };
};

export const parseBarTimestamp = (value: unknown): Date | null => {
  if (typeof value !== 'string') return null;
  const parsed = moment.utc(value, BAR_TIMESTAMP_FORMAT, true);
  return parsed.isValid() ? parsed.toDate() : null;
};

export const satisfiesBarInvariants = (bar: Pick<ValidatedBar, 'open' | 'high' | 'low' | 'close' | 'volume'>) =>
  bar.close > 0 &&
  bar.volume >= 0 &&
  bar.high >= bar.low &&
  bar.high >= bar.close &&
  bar.low <= bar.close &&
  bar.open > 0 &&
  bar.low > 0;

/**
 * Coerces one raw row. Timestamp failures are reported first, then a present
 * but non-numeric field, then a missing one.
 */
const toCandidate = (raw: RawBar, symbol: string): ValidatedBar | RejectionReason => {
  const timestamp = parseBarTimestamp(raw.date);
  if (!timestamp) return 'timestamp';

  const fields = [...PRICE_FIELDS, 'volume'] as const;
  const values: Partial<Record<(typeof fields)[number], number>> = {};
  let missing = false;
  for (const field of fields) {
    const coerced = coerceNumber(raw[field]);
    if (coerced.ok) {
      values[field] = coerced.value;
    } else if (coerced.reason === 'malformed') {
      return 'malformed';
    } else {
      missing = true;
    }
  }
  if (missing) return 'missing';

  const { open, high, low, close, volume } = values;
  if (open === undefined || high === undefined || low === undefined || close === undefined || volume === undefined) {
    return 'missing';
  }
  if (!Number.isSafeInteger(volume)) return 'malformed';

  return {
    symbol,
    timestamp,
    date: moment.utc(timestamp).format('YYYY-MM-DD'),
    open,
    high,
    low,
    close,
    volume,
  };
};

export const emptyRejections = (): RejectionCounts => ({
  timestamp: 0,
  malformed: 0,
  missing: 0,
  invariant: 0,
  duplicate: 0,
});

/**
 * Turns a provider batch into bars that are safe to store: parsed timestamp,
 * numeric fields, OHLC/volume invariants, unique per minute (first row wins),
 * ascending by time. Never throws; rejected rows are only counted.
 */
export const cleanBars = (rawBars: readonly RawBar[], symbol: string): CleanResult => {
  const normalizedSymbol = symbol.trim().toUpperCase();
  const rejections = emptyRejections();
  const seen = new Set<number>();
  const bars: ValidatedBar[] = [];

  // A bar without a symbol cannot be stored
  if (normalizedSymbol === '') {
    rejections.malformed = rawBars.length;
    return { bars, removed: rawBars.length, rejections };
  }

  for (const raw of rawBars) {
    const candidate = toCandidate(raw, normalizedSymbol);
    if (typeof candidate === 'string') {
      rejections[candidate]++;
      continue;
    }
    if (!satisfiesBarInvariants(candidate)) {
      rejections.invariant++;
      continue;
    }
    const key = candidate.timestamp.getTime();
    if (seen.has(key)) {
      rejections.duplicate++;
      continue;
    }
    seen.add(key);
    bars.push(candidate);
  }

  // Array.prototype.sort is stable
  bars.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

  const removed = rawBars.length - bars.length;
  return { bars, removed, rejections };
};
