// =============================================================================
// METRICS CALCULATION (Pure functions)
// =============================================================================

import type { BacktestMetrics, ClosedTrade, EquityPoint } from './types.js';

/** Trading days per year used to annualize per-bar Sharpe */
export const ANNUALIZATION_FACTOR = Math.sqrt(252);

export const EMPTY_METRICS: Readonly<BacktestMetrics> = Object.freeze({
  tradeCount: 0,
  wins: 0,
  losses: 0,
  winRate: 0,
  totalPnl: 0,
  sharpeRatio: 0,
  maxDrawdown: 0,
});

/**
 * Per-bar fractional returns of an equity curve.
 * Steps from a zero equity are skipped.
 */
export function equityReturns(curve: readonly EquityPoint[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < curve.length; i++) {
    const prev = curve[i - 1].equity;
    if (prev === 0) continue;
    returns.push(curve[i].equity / prev - 1);
  }
  return returns;
}

/**
 * Annualized Sharpe of per-bar returns (population stddev, zero risk-free rate).
 * 0 with fewer than two equity points or zero variance.
 */
export function calculateSharpeRatio(curve: readonly EquityPoint[]): number {
  if (curve.length < 2) return 0;

  const returns = equityReturns(curve);
  if (returns.length === 0) return 0;

  const mean = returns.reduce((sum, r) => sum + r, 0) / returns.length;
  const variance = returns.reduce((sum, r) => sum + Math.pow(r - mean, 2), 0) / returns.length;
  const stdDev = Math.sqrt(variance);

  return stdDev > 0 ? (mean / stdDev) * ANNUALIZATION_FACTOR : 0;
}

/**
 * Deepest drawdown as a non-positive fraction of the running peak
 */
export function calculateMaxDrawdown(curve: readonly EquityPoint[]): number {
  let peak = -Infinity;
  let maxDrawdown = 0;

  for (const point of curve) {
    peak = Math.max(peak, point.equity);
    if (peak <= 0) continue;
    const drawdown = (point.equity - peak) / peak;
    maxDrawdown = Math.min(maxDrawdown, drawdown);
  }

  return maxDrawdown;
}

/**
 * Calculate all backtest metrics from closed trades and the equity curve.
 * No closed trades means zero-valued metrics.
 */
export function calculateMetrics(trades: readonly ClosedTrade[], curve: readonly EquityPoint[]): BacktestMetrics {
  if (trades.length === 0) {
    return { ...EMPTY_METRICS };
  }

  const wins = trades.filter((t) => t.pnl > 0).length;
  const totalPnl = trades.reduce((sum, t) => sum + t.pnl, 0);

  return {
    tradeCount: trades.length,
    wins,
    losses: trades.length - wins,
    winRate: wins / trades.length,
    totalPnl,
    sharpeRatio: calculateSharpeRatio(curve),
    maxDrawdown: calculateMaxDrawdown(curve),
  };
}
