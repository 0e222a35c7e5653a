/**
 * JSON Reporter for Backtest Results
 */

import type { BacktestResult } from '../types.js';

/**
 * Options for JSON export
 */
export interface JSONExportOptions {
  /** Pretty print with indentation */
  pretty?: boolean;
  /** Include individual trades */
  includeTrades?: boolean;
  /** Include the per-bar equity curve */
  includeEquityCurve?: boolean;
}

const DEFAULT_OPTIONS: Required<JSONExportOptions> = {
  pretty: true,
  includeTrades: true,
  includeEquityCurve: true,
};

/**
 * Convert BacktestResult to a JSON-serializable object
 */
export function toJSON(result: BacktestResult, options?: JSONExportOptions): Record<string, unknown> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  const json: Record<string, unknown> = {
    metadata: {
      symbol: result.symbol,
      interval: result.interval,
      from: result.from ?? null,
      to: result.to ?? null,
      status: result.status,
      candlesCount: result.candlesCount,
    },
    metrics: result.metrics,
  };

  if (opts.includeTrades) {
    json.trades = result.trades;
  }

  if (opts.includeEquityCurve) {
    json.equityCurve = result.equityCurve;
  }

  return json;
}

/**
 * JSON report text
 */
export function toJsonReport(result: BacktestResult, options?: JSONExportOptions): string {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const json = toJSON(result, opts);
  return opts.pretty ? JSON.stringify(json, null, 2) : JSON.stringify(json);
}
