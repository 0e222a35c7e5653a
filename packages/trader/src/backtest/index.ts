/**
 * SMA Crossover Backtest Engine
 *
 * @example
 * ```typescript
 * import { BacktestEngine, BarSource, CsvBarAdapter, formatMetrics } from '@crossover-bot/trader';
 *
 * const bars = new BarSource(new CsvBarAdapter({ directory: './data' }));
 * const engine = new BacktestEngine(bars, { initialCapital: 100_000 });
 *
 * const result = await engine.run({
 *   symbol: 'RELIANCE.NS',
 *   interval: '1d',
 *   strategyParams: { fastWindow: 10, slowWindow: 30 },
 * });
 *
 * console.log(formatMetrics(result));
 * ```
 */

// Types
export * from './types.js';

// Engine
export {
  BacktestEngine,
  simulateCrossover,
  type BacktestEngineOptions,
  type BarProvider,
  type SimulationOutput,
} from './backtest-engine.js';
export { PositionLedger } from './engine/index.js';

// Metrics
export {
  ANNUALIZATION_FACTOR,
  EMPTY_METRICS,
  calculateMaxDrawdown,
  calculateMetrics,
  calculateSharpeRatio,
  equityReturns,
} from './metrics.js';

// Data
export { loadBarsFromCSV, parseCSVTimestamp, type CSVLoadOptions, type CSVTimestampFormat } from './data/index.js';

// Reporters
export {
  formatMetrics,
  formatTrade,
  printBacktestResult,
  toJSON,
  toJsonReport,
  type JSONExportOptions,
} from './reporters/index.js';
