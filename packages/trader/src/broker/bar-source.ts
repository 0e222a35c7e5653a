/**
 * Bar source backed by a broker adapter
 */

import { assertCapabilities, createLogger, errorMessage, type Bar, type BrokerAdapter, type Logger } from '@crossover-bot/shared';
import type { BarProvider } from '../backtest/backtest-engine.js';
import { normalizeBars } from './bar-normalizer.js';

export class BarSource implements BarProvider {
  private readonly logger: Logger;

  /**
   * @throws ConfigurationError when the adapter cannot serve bars
   */
  constructor(
    private readonly adapter: BrokerAdapter,
    logger?: Logger
  ) {
    assertCapabilities(adapter, ['bars']);
    this.logger = (logger ?? createLogger({ service: 'trader', silent: true })).child({ component: 'bar-source' });
  }

  /**
   * Fetch and normalize bars. Any fetch or parse failure yields [].
   */
  async getBars(symbol: string, interval: string, from?: string | number, to?: string | number): Promise<Bar[]> {
    try {
      const raw = await this.adapter.getBars({ symbol, interval, from, to });
      const bars = normalizeBars(raw);
      this.logger.debug('Bars fetched', { adapter: this.adapter.name, symbol, interval, raw: raw.length, bars: bars.length });
      return bars;
    } catch (error) {
      this.logger.warn('Bar fetch failed', { adapter: this.adapter.name, symbol, interval, error: errorMessage(error) });
      return [];
    }
  }
}
