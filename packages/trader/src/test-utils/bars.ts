import type { Bar } from '@crossover-bot/shared';

export const DAY_MS = 86_400_000;
export const START_MS = Date.UTC(2024, 0, 1);

/**
 * Daily bars with open = high = low = close
 */
export function makeBars(closes: number[], start: number = START_MS, step: number = DAY_MS): Bar[] {
  return closes.map((close, i) => ({
    timestamp: start + i * step,
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000,
  }));
}
