/**
 * Unified Types for Backtest Engine
 */

import type { Bar, StrategyParamsInput } from '@crossover-bot/shared';

export type { Bar };

// =============================================================================
// TRADES
// =============================================================================

export type TradeSide = 'BUY';

interface TradeBase {
  symbol: string;
  side: TradeSide;
  qty: number;
  entryTime: number;
  entryPrice: number;
}

/**
 * Trade still holding a position. Exit fields stay null together.
 */
export interface OpenTrade extends TradeBase {
  status: 'OPEN';
  exitTime: null;
  exitPrice: null;
  pnl: null;
}

/**
 * Trade after exit or forced close. Never mutated afterwards.
 */
export interface ClosedTrade extends TradeBase {
  status: 'CLOSED';
  exitTime: number;
  exitPrice: number;
  pnl: number;
}

export type Trade = OpenTrade | ClosedTrade;

// =============================================================================
// EQUITY & METRICS
// =============================================================================

export interface EquityPoint {
  timestamp: number;
  equity: number;
}

export interface BacktestMetrics {
  tradeCount: number;
  wins: number;
  losses: number;
  /** Fraction of closed trades with pnl > 0 (0..1) */
  winRate: number;
  totalPnl: number;
  /** Annualized (sqrt 252) mean / stddev of per-bar equity returns */
  sharpeRatio: number;
  /** Deepest (equity - peak) / peak; always <= 0 */
  maxDrawdown: number;
}

// =============================================================================
// RUN REQUEST / RESULT
// =============================================================================

export interface BacktestRunRequest {
  symbol: string;
  interval: string;
  from?: string | number;
  to?: string | number;
  strategyParams: StrategyParamsInput;
}

export type BacktestStatus = 'ok' | 'no_data';

export interface BacktestResult {
  symbol: string;
  interval: string;
  from?: string | number;
  to?: string | number;
  status: BacktestStatus;
  trades: ClosedTrade[];
  equityCurve: EquityPoint[];
  metrics: BacktestMetrics;
  candlesCount: number;
}

export const DEFAULT_INITIAL_CAPITAL = 100_000;
