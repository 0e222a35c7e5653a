/**
 * @crossover-bot/trader - SMA crossover backtesting and live execution
 */

// Indicators
export * from './indicators/index.js';

// Strategy
export {
  computeSignalSeries,
  evaluateCrossover,
  parseStrategyParams,
  type CrossoverSignal,
  type SignalPoint,
} from './strategies/sma-crossover.strategy.js';

// Backtesting
export * from './backtest/index.js';

// Broker adapters
export * from './broker/index.js';

// Live execution
export * from './execution/index.js';
