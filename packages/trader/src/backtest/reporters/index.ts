/**
 * Backtest Reporters
 */

export { formatMetrics, formatTrade, printBacktestResult } from './console-reporter.js';

export { toJSON, toJsonReport, type JSONExportOptions } from './json-reporter.js';
