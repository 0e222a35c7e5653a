/**
 * Bar normalization
 *
 * Upstreams hand back candles as positional arrays ([ts, o, h, l, c, v, ...])
 * or keyed records with long or short keys. Everything is coerced to the
 * canonical Bar with a Unix-ms timestamp.
 */

import {
  BarSchema,
  KeyedBarSchema,
  PositionalBarSchema,
  type Bar,
  type KeyedBar,
} from '@crossover-bot/shared';

const NUMERIC_STRING = /^-?\d+(\.\d+)?$/;
// "+0530" style offsets are not ISO-8601; Date.parse wants "+05:30"
const COMPACT_OFFSET = /([+-]\d{2})(\d{2})$/;

/**
 * Upstream timestamp to Unix ms.
 * Numbers and numeric strings are milliseconds; other strings are ISO-8601.
 */
export function parseTimestampMs(value: number | string): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.floor(value) : undefined;
  }

  const trimmed = value.trim();
  const ms = NUMERIC_STRING.test(trimmed) ? Number(trimmed) : Date.parse(trimmed.replace(COMPACT_OFFSET, '$1:$2'));
  return Number.isFinite(ms) ? Math.floor(ms) : undefined;
}

function fromKeyed(row: KeyedBar): Partial<Bar> & { rawTimestamp?: number | string } {
  return {
    rawTimestamp: row.timestamp ?? row.time ?? row.date ?? row.datetime,
    open: row.open ?? row.o,
    high: row.high ?? row.h,
    low: row.low ?? row.l,
    close: row.close ?? row.c,
    volume: row.volume ?? row.v ?? 0,
  };
}

/**
 * Normalize one upstream row; undefined when it cannot be read
 */
export function normalizeBar(row: unknown): Bar | undefined {
  let candidate: Partial<Bar> & { rawTimestamp?: number | string };

  if (Array.isArray(row)) {
    const positional = PositionalBarSchema.safeParse(row);
    if (!positional.success) return undefined;
    const [rawTimestamp, open, high, low, close, volume] = positional.data;
    candidate = { rawTimestamp, open, high, low, close, volume };
  } else {
    const keyed = KeyedBarSchema.safeParse(row);
    if (!keyed.success) return undefined;
    candidate = fromKeyed(keyed.data);
  }

  if (candidate.rawTimestamp === undefined) return undefined;

  const bar = BarSchema.safeParse({
    timestamp: parseTimestampMs(candidate.rawTimestamp),
    open: candidate.open,
    high: candidate.high,
    low: candidate.low,
    close: candidate.close,
    volume: candidate.volume,
  });

  return bar.success ? bar.data : undefined;
}

/**
 * Normalize a batch of upstream rows.
 * Unreadable rows are dropped; output is ascending with one bar per
 * timestamp (first occurrence wins).
 */
export function normalizeBars(rows: readonly unknown[]): Bar[] {
  const bars: Bar[] = [];
  for (const row of rows) {
    const bar = normalizeBar(row);
    if (bar) bars.push(bar);
  }

  // Stable sort keeps input order among equal timestamps
  bars.sort((a, b) => a.timestamp - b.timestamp);

  return bars.filter((bar, i) => i === 0 || bar.timestamp !== bars[i - 1].timestamp);
}
