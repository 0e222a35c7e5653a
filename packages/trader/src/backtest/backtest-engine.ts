/**
 * Backtest Engine
 *
 * Principles:
 * 1. Deterministic: same bars + params => same trades, curve and metrics
 * 2. Separation: data (bar source), signals (strategy), execution (ledger), metrics
 * 3. Data problems never throw; they come back as status 'no_data'
 * 4. Bad configuration throws ConfigurationError before any data is fetched
 */

import {
  BacktestRequestSchema,
  ConfigurationError,
  createLogger,
  errorMessage,
  type Bar,
  type Logger,
  type StrategyParams,
} from '@crossover-bot/shared';
import { PositionLedger } from './engine/position-ledger.js';
import { calculateMetrics, EMPTY_METRICS } from './metrics.js';
import {
  DEFAULT_INITIAL_CAPITAL,
  type BacktestResult,
  type BacktestRunRequest,
  type ClosedTrade,
  type EquityPoint,
} from './types.js';
import { computeSignalSeries, evaluateCrossover, parseStrategyParams } from '../strategies/sma-crossover.strategy.js';

/**
 * Anything that can hand the engine a time-ordered bar sequence
 */
export interface BarProvider {
  getBars(symbol: string, interval: string, from?: string | number, to?: string | number): Promise<Bar[]>;
}

export interface BacktestEngineOptions {
  /** Starting cash (default 100,000) */
  initialCapital?: number;
  logger?: Logger;
}

export interface SimulationOutput {
  trades: ClosedTrade[];
  equityCurve: EquityPoint[];
}

// =============================================================================
// SIMULATION (Pure function - no side effects)
// =============================================================================

/**
 * Run the crossover over a bar sequence.
 *
 * One equity point per bar with both averages defined; any position still
 * open after the last bar is closed at that bar's close.
 */
export function simulateCrossover(
  symbol: string,
  bars: readonly Bar[],
  params: StrategyParams,
  initialCapital: number = DEFAULT_INITIAL_CAPITAL
): SimulationOutput {
  const ledger = new PositionLedger(symbol, initialCapital, params.allocationFraction);
  const series = computeSignalSeries(bars, params);

  for (const point of series) {
    const signal = evaluateCrossover(point, ledger.isOpen);

    if (signal === 'ENTRY') {
      ledger.enter(point.bar);
    } else if (signal === 'EXIT') {
      ledger.exit(point.bar);
    }

    ledger.markToMarket(point.bar);
  }

  // Forced close at end of sequence
  const lastPoint = series[series.length - 1];
  if (lastPoint && ledger.isOpen) {
    ledger.exit(lastPoint.bar);
  }

  return {
    trades: [...ledger.trades],
    equityCurve: [...ledger.equityCurve],
  };
}

// =============================================================================
// ENGINE
// =============================================================================

export class BacktestEngine {
  private readonly initialCapital: number;
  private readonly logger: Logger;

  constructor(
    private readonly barSource: BarProvider,
    options: BacktestEngineOptions = {}
  ) {
    this.initialCapital = options.initialCapital ?? DEFAULT_INITIAL_CAPITAL;
    if (!(this.initialCapital > 0)) {
      throw new ConfigurationError(`initialCapital must be positive, got ${this.initialCapital}`);
    }
    this.logger = (options.logger ?? createLogger({ service: 'backtest', silent: true })).child({
      component: 'backtest-engine',
    });
  }

  /**
   * Fetch bars and simulate the crossover strategy
   *
   * @throws ConfigurationError for a malformed request or invalid strategy params
   */
  async run(request: BacktestRunRequest): Promise<BacktestResult> {
    const parsedRequest = BacktestRequestSchema.safeParse(request);
    if (!parsedRequest.success) {
      const details = parsedRequest.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid backtest request: ${details}`);
    }

    const { symbol, interval, from, to } = request;
    const params = parseStrategyParams(request.strategyParams);

    const bars = await this.fetchBars(symbol, interval, from, to);

    if (bars.length === 0) {
      this.logger.warn('No bars available for backtest', { symbol, interval, from, to });
      return {
        symbol,
        interval,
        from,
        to,
        status: 'no_data',
        trades: [],
        equityCurve: [],
        metrics: { ...EMPTY_METRICS },
        candlesCount: 0,
      };
    }

    const { trades, equityCurve } = simulateCrossover(symbol, bars, params, this.initialCapital);
    const metrics = calculateMetrics(trades, equityCurve);

    this.logger.info('Backtest completed', {
      symbol,
      interval,
      candles: bars.length,
      trades: metrics.tradeCount,
      winRate: metrics.winRate,
      maxDrawdown: metrics.maxDrawdown,
    });

    return {
      symbol,
      interval,
      from,
      to,
      status: 'ok',
      trades,
      equityCurve,
      metrics,
      candlesCount: bars.length,
    };
  }

  private async fetchBars(symbol: string, interval: string, from?: string | number, to?: string | number): Promise<Bar[]> {
    try {
      return await this.barSource.getBars(symbol, interval, from, to);
    } catch (error) {
      this.logger.warn('Bar source failed, treating as empty', { symbol, interval, error: errorMessage(error) });
      return [];
    }
  }
}
