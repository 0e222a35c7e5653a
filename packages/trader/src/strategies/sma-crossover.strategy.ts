/**
 * SMA Crossover Strategy
 *
 * Two simple moving averages of the close (fast < slow). Long entry while
 * the fast average sits strictly above the slow one and we are flat; exit
 * while it sits strictly below and we hold a position. Equal averages
 * produce no signal.
 *
 * Pure: the same bars and params always yield the same series.
 */

import {
  ConfigurationError,
  StrategyParamsSchema,
  type Bar,
  type StrategyParams,
  type StrategyParamsInput,
} from '@crossover-bot/shared';
import { RollingSMA } from '../indicators/index.js';

export type CrossoverSignal = 'ENTRY' | 'EXIT' | 'NONE';

/**
 * Averages for one bar on which both windows are full
 */
export interface SignalPoint {
  /** Index of the bar in the input sequence */
  index: number;
  bar: Bar;
  fastAvg: number;
  slowAvg: number;
}

/**
 * Validate crossover params
 *
 * @throws ConfigurationError when windows are not positive integers with fast < slow,
 *         or allocationFraction is outside (0, 1]
 */
export function parseStrategyParams(input: StrategyParamsInput): StrategyParams {
  const parsed = StrategyParamsSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid strategy params: ${details}`);
  }
  return parsed.data;
}

/**
 * Compute the signal series for a bar sequence.
 *
 * Bars before both averages exist are dropped, so the first point is at
 * index slowWindow - 1. Single pass, O(1) per bar.
 */
export function computeSignalSeries(bars: readonly Bar[], params: StrategyParams): SignalPoint[] {
  const fast = new RollingSMA(params.fastWindow);
  const slow = new RollingSMA(params.slowWindow);
  const points: SignalPoint[] = [];

  bars.forEach((bar, index) => {
    const fastAvg = fast.next(bar.close);
    const slowAvg = slow.next(bar.close);
    if (fastAvg === undefined || slowAvg === undefined) return;
    points.push({ index, bar, fastAvg, slowAvg });
  });

  return points;
}

/**
 * Derive the signal for one point given the current position state
 */
export function evaluateCrossover(point: Pick<SignalPoint, 'fastAvg' | 'slowAvg'>, positionOpen: boolean): CrossoverSignal {
  const { fastAvg, slowAvg } = point;
  if (averagesEqual(fastAvg, slowAvg)) return 'NONE';
  if (!positionOpen && fastAvg > slowAvg) return 'ENTRY';
  if (positionOpen && fastAvg < slowAvg) return 'EXIT';
  return 'NONE';
}

/** Relative tolerance below which two averages count as equal */
const AVERAGE_EPSILON = 1e-9;

// Running sums drift in the last bits, so flat prices can leave the averages a few ulps apart
function averagesEqual(a: number, b: number): boolean {
  return Math.abs(a - b) <= AVERAGE_EPSILON * Math.max(Math.abs(a), Math.abs(b), 1);
}
