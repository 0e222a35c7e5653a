/**
 * Technical Indicators
 *
 * Wrapper around technicalindicators library
 * Provides type-safe, Bar-compatible API
 */

import { SMA } from 'technicalindicators';
import type { Bar } from '@crossover-bot/shared';

type PriceField = 'open' | 'high' | 'low' | 'close';

/**
 * Extract values from bars
 */
function extractValues(bars: readonly Bar[], field: PriceField): number[] {
  return bars.map((b) => b[field]);
}

/**
 * Simple Moving Average (batch)
 *
 * Output is shorter than the input by period - 1 entries.
 */
export function calculateSMA(bars: readonly Bar[], period: number, field: PriceField = 'close'): number[] {
  return SMA.calculate({
    period,
    values: extractValues(bars, field),
  });
}

/**
 * Streaming Simple Moving Average over a fixed window.
 *
 * Each update is O(1): the underlying generator keeps a running sum and
 * drops the value leaving the window.
 */
export class RollingSMA {
  private sma: SMA;
  private count = 0;

  constructor(readonly period: number) {
    if (!Number.isInteger(period) || period < 1) {
      throw new RangeError(`SMA period must be a positive integer, got ${period}`);
    }
    this.sma = new SMA({ period, values: [] });
  }

  /**
   * Push a value; returns the average once the window is full
   */
  next(value: number): number | undefined {
    this.count++;
    return this.sma.nextValue(value);
  }

  /** Number of values pushed so far */
  get size(): number {
    return this.count;
  }

  get ready(): boolean {
    return this.count >= this.period;
  }
}
