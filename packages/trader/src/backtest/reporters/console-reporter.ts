/**
 * Console Reporter for Backtest Results
 */

import type { BacktestResult, ClosedTrade } from '../types.js';

/**
 * Format a number with fixed decimals
 */
function fmt(n: number, decimals: number = 2): string {
  return n.toFixed(decimals);
}

/**
 * Format a fraction as a percentage
 */
function fmtPct(fraction: number): string {
  return `${fmt(fraction * 100, 1)}%`;
}

function fmtTime(ms: number): string {
  return new Date(ms).toISOString().replace('T', ' ').slice(0, 19);
}

/**
 * Create a horizontal line
 */
function line(char: string = '─', length: number = 60): string {
  return char.repeat(length);
}

/**
 * Plain-text summary of a backtest result
 */
export function formatMetrics(result: BacktestResult): string {
  const { metrics } = result;
  const finalEquity = result.equityCurve[result.equityCurve.length - 1]?.equity;

  const lines = [
    line('═'),
    `  BACKTEST RESULT: ${result.symbol} ${result.interval}`,
    line('═'),
    `  Status:       ${result.status}`,
    `  Candles:      ${result.candlesCount}`,
    `  Trades:       ${metrics.tradeCount} (${metrics.wins}W / ${metrics.losses}L)`,
    `  Win Rate:     ${fmtPct(metrics.winRate)}`,
    `  Net P&L:      ${fmt(metrics.totalPnl)}`,
    `  Sharpe:       ${fmt(metrics.sharpeRatio)}`,
    `  Max Drawdown: ${fmtPct(metrics.maxDrawdown)}`,
  ];

  if (finalEquity !== undefined) {
    lines.push(`  Final Equity: ${fmt(finalEquity)}`);
  }

  return lines.join('\n');
}

/**
 * One line per closed trade
 */
export function formatTrade(trade: ClosedTrade): string {
  return (
    `${fmtTime(trade.entryTime)} → ${fmtTime(trade.exitTime)} | ` +
    `${trade.side} ${trade.qty} @ ${fmt(trade.entryPrice)} → ${fmt(trade.exitPrice)} | ` +
    `P&L ${fmt(trade.pnl)}`
  );
}

/**
 * Print backtest result summary to console
 */
export function printBacktestResult(result: BacktestResult, options: { showTrades?: boolean } = {}): void {
  console.log('\n' + formatMetrics(result));

  if (options.showTrades && result.trades.length > 0) {
    console.log('\n📋 TRADES');
    console.log(line());
    for (const trade of result.trades) {
      console.log(`  ${formatTrade(trade)}`);
    }
  }

  console.log(line('═') + '\n');
}
