/**
 * SMA Crossover Backtest Runner
 *
 * Usage:
 *   npm run backtest -- --csv data/RELIANCE.NS_1d.csv --symbol RELIANCE.NS --interval 1d --fast 10 --slow 30
 *   npm run backtest -- --csv ... --allocation 0.5 --capital 250000 --json
 */

import { parseArgs } from 'util';
import {
  ConfigurationError,
  createLogger,
  errorMessage,
  loadConfig,
  loadEnvFromRoot,
  type StrategyParamsInput,
} from '@crossover-bot/shared';
import { BacktestEngine } from './backtest-engine.js';
import { printBacktestResult, toJsonReport } from './reporters/index.js';
import { BarSource } from '../broker/bar-source.js';
import { CsvBarAdapter } from '../broker/csv-bar-adapter.js';

export interface CliOptions {
  csv: string;
  symbol: string;
  interval: string;
  strategyParams: StrategyParamsInput;
  capital?: number;
  from?: string;
  to?: string;
  json: boolean;
  showTrades: boolean;
}

function toNumber(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`--${name} must be a number, got "${value}"`);
  }
  return parsed;
}

function required(name: string, value: string | undefined): string {
  if (!value) {
    throw new ConfigurationError(`--${name} is required`);
  }
  return value;
}

/**
 * Parse command line arguments (without the node and script entries)
 *
 * @throws ConfigurationError for missing or non-numeric values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      csv: { type: 'string' },
      symbol: { type: 'string' },
      interval: { type: 'string' },
      fast: { type: 'string' },
      slow: { type: 'string' },
      allocation: { type: 'string' },
      capital: { type: 'string' },
      from: { type: 'string' },
      to: { type: 'string' },
      json: { type: 'boolean', default: false },
      trades: { type: 'boolean', default: false },
    },
    strict: true,
  });

  const optionalNumber = (name: 'allocation' | 'capital'): number | undefined => {
    const value = values[name];
    return value === undefined ? undefined : toNumber(name, value);
  };

  return {
    csv: required('csv', values.csv),
    symbol: required('symbol', values.symbol),
    interval: required('interval', values.interval),
    strategyParams: {
      fastWindow: toNumber('fast', required('fast', values.fast)),
      slowWindow: toNumber('slow', required('slow', values.slow)),
      allocationFraction: optionalNumber('allocation'),
    },
    capital: optionalNumber('capital'),
    from: values.from,
    to: values.to,
    json: values.json === true,
    showTrades: values.trades === true,
  };
}

async function main(): Promise<void> {
  loadEnvFromRoot();
  const config = loadConfig();
  const logger = createLogger({
    service: 'backtest',
    level: config.logLevel,
    file: config.logToFile,
    logDir: config.logDir,
  });

  try {
    const options = parseCliArgs(process.argv.slice(2));

    const adapter = new CsvBarAdapter({ file: options.csv, logger });
    const engine = new BacktestEngine(new BarSource(adapter, logger), {
      initialCapital: options.capital ?? config.runDefaults.capital,
      logger,
    });

    const result = await engine.run({
      symbol: options.symbol,
      interval: options.interval,
      from: options.from,
      to: options.to,
      strategyParams: {
        ...options.strategyParams,
        allocationFraction: options.strategyParams.allocationFraction ?? config.runDefaults.allocation,
      },
    });

    if (options.json) {
      console.log(toJsonReport(result));
    } else {
      printBacktestResult(result, { showTrades: options.showTrades });
    }

    if (result.status === 'no_data') {
      process.exitCode = 2;
    }
  } catch (error) {
    logger.error('Backtest failed', { error: errorMessage(error) });
    process.exitCode = 1;
  } finally {
    await logger.close();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error('❌ Fatal error:', error);
    process.exit(1);
  });
}
