/**
 * CSV files exposed as a bars-only broker adapter.
 * With a directory, files are looked up as <dir>/<symbol>_<interval>.csv;
 * with a single file, every request reads that file.
 */

import * as path from 'path';
import {
  ConfigurationError,
  type BarRequest,
  type BrokerAdapter,
  type BrokerCapabilities,
  type Logger,
  type OrderAck,
  type OrderRequest,
} from '@crossover-bot/shared';
import { loadBarsFromCSV, type CSVLoadOptions } from '../backtest/data/index.js';
import { parseTimestampMs } from './bar-normalizer.js';

export type CsvBarAdapterOptions = ({ directory: string; file?: undefined } | { file: string; directory?: undefined }) & {
  csv?: Omit<CSVLoadOptions, 'logger'>;
  logger?: Logger;
};

export class CsvBarAdapter implements BrokerAdapter {
  readonly name = 'csv';
  readonly capabilities: BrokerCapabilities = { bars: true, orders: false };

  constructor(private readonly options: CsvBarAdapterOptions) {}

  filePathFor(symbol: string, interval: string): string {
    if (this.options.file !== undefined) return this.options.file;
    return path.join(this.options.directory, `${symbol}_${interval}.csv`);
  }

  async getBars(request: BarRequest): Promise<readonly unknown[]> {
    const bars = loadBarsFromCSV(this.filePathFor(request.symbol, request.interval), {
      ...this.options.csv,
      logger: this.options.logger,
    });

    const from = request.from === undefined ? undefined : parseTimestampMs(request.from);
    const to = request.to === undefined ? undefined : parseTimestampMs(request.to);

    return bars.filter((bar) => (from === undefined || bar.timestamp >= from) && (to === undefined || bar.timestamp <= to));
  }

  isAuthenticated(): boolean {
    return false;
  }

  async placeOrder(order: OrderRequest): Promise<OrderAck> {
    throw new ConfigurationError(`CSV adapter cannot place orders (${order.symbol ?? 'no symbol'})`);
  }
}
