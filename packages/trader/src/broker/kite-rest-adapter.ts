/**
 * Kite Connect REST adapter
 *
 * Provides:
 * - Historical candles (GET /instruments/historical/{token}/{interval})
 * - Regular order placement (POST /orders/regular)
 *
 * Kite addresses instruments by numeric token for candles and by
 * exchange + tradingsymbol for orders; symbols here carry a Yahoo-style
 * exchange suffix (RELIANCE.NS, TCS.BO).
 */

import { z } from 'zod';
import {
  BrokerError,
  ConfigurationError,
  createLogger,
  errorMessage,
  type BarRequest,
  type BrokerAdapter,
  type BrokerCapabilities,
  type Logger,
  type OrderAck,
  type OrderRequest,
} from '@crossover-bot/shared';
import type { BrokerSession } from './broker-session.js';

export const DEFAULT_KITE_BASE_URL = 'https://api.kite.trade';

/**
 * Interval aliases accepted by getBars, mapped to Kite interval names
 */
export const KITE_INTERVALS: Readonly<Record<string, string>> = {
  '1m': 'minute',
  '3m': '3minute',
  '5m': '5minute',
  '10m': '10minute',
  '15m': '15minute',
  '30m': '30minute',
  '60m': '60minute',
  '1h': '60minute',
  '1d': 'day',
};

const EXCHANGE_SUFFIXES: Readonly<Record<string, string>> = {
  '.NS': 'NSE',
  '.BO': 'BSE',
};

const KiteEnvelopeSchema = z.object({
  status: z.string(),
  data: z.unknown().optional(),
  message: z.string().optional(),
  error_type: z.string().optional(),
});

const HistoricalDataSchema = z.object({
  candles: z.array(z.unknown()),
});

const OrderDataSchema = z.object({
  order_id: z.union([z.string(), z.number()]).transform(String),
});

export interface KiteRestAdapterOptions {
  session: BrokerSession;
  baseUrl?: string;
  /** Symbol (e.g. "RELIANCE.NS") to Kite instrument token */
  instrumentTokens?: Record<string, number | string>;
  /** Product code when the order does not name one (default CNC) */
  defaultProduct?: string;
  logger?: Logger;
}

/**
 * Split "RELIANCE.NS" into Kite exchange and tradingsymbol.
 * "NSE:RELIANCE" is accepted too; a bare symbol defaults to NSE.
 */
export function toKiteInstrument(symbol: string): { exchange: string; tradingsymbol: string } {
  for (const [suffix, exchange] of Object.entries(EXCHANGE_SUFFIXES)) {
    if (symbol.toUpperCase().endsWith(suffix)) {
      return { exchange, tradingsymbol: symbol.slice(0, -suffix.length) };
    }
  }

  const separator = symbol.indexOf(':');
  if (separator > 0) {
    return { exchange: symbol.slice(0, separator), tradingsymbol: symbol.slice(separator + 1) };
  }

  return { exchange: 'NSE', tradingsymbol: symbol };
}

/**
 * Kite expects "yyyy-mm-dd hh:mm:ss"; numbers are Unix ms
 */
export function toKiteTimestamp(value: string | number): string {
  if (typeof value === 'string') return value;
  return new Date(value).toISOString().slice(0, 19).replace('T', ' ');
}

export class KiteRestAdapter implements BrokerAdapter {
  readonly name = 'kite';
  readonly capabilities: BrokerCapabilities = { bars: true, orders: true };

  private readonly session: BrokerSession;
  private readonly baseUrl: string;
  private readonly instrumentTokens: Record<string, number | string>;
  private readonly defaultProduct: string;
  private readonly logger: Logger;

  constructor(options: KiteRestAdapterOptions) {
    this.session = options.session;
    this.baseUrl = (options.baseUrl ?? DEFAULT_KITE_BASE_URL).replace(/\/+$/, '');
    this.instrumentTokens = options.instrumentTokens ?? {};
    this.defaultProduct = options.defaultProduct ?? 'CNC';
    this.logger = (options.logger ?? createLogger({ service: 'trader', silent: true })).child({ component: 'kite-rest' });
  }

  isAuthenticated(): boolean {
    return this.session.isAuthenticated();
  }

  // ============ MARKET DATA ============

  /**
   * Raw Kite candles: ["2024-01-01T09:15:00+0530", o, h, l, c, v]
   *
   * @throws ConfigurationError for an unmapped symbol or unknown interval
   * @throws BrokerError when Kite rejects the request
   */
  async getBars(request: BarRequest): Promise<readonly unknown[]> {
    const token = this.instrumentTokens[request.symbol];
    if (token === undefined) {
      throw new ConfigurationError(`No instrument token configured for ${request.symbol}`);
    }

    const interval = this.resolveInterval(request.interval);
    const query = new URLSearchParams();
    if (request.from !== undefined) query.set('from', toKiteTimestamp(request.from));
    if (request.to !== undefined) query.set('to', toKiteTimestamp(request.to));

    const qs = query.toString();
    const data = await this.request('GET', `/instruments/historical/${token}/${interval}${qs ? `?${qs}` : ''}`);

    const parsed = HistoricalDataSchema.safeParse(data);
    if (!parsed.success) {
      throw new BrokerError('Unexpected historical data payload from Kite');
    }
    return parsed.data.candles;
  }

  // ============ ORDERS ============

  /**
   * @throws BrokerError when Kite rejects the order or cannot be reached
   */
  async placeOrder(order: OrderRequest): Promise<OrderAck> {
    if (!order.symbol) {
      throw new BrokerError('Order has no symbol');
    }

    const { exchange, tradingsymbol } = toKiteInstrument(order.symbol);
    const form = new URLSearchParams({
      tradingsymbol,
      exchange,
      transaction_type: order.side,
      order_type: order.orderType,
      quantity: String(order.quantity),
      product: order.product ?? this.defaultProduct,
      validity: 'DAY',
    });
    if (order.orderType === 'LIMIT' && order.price !== undefined) {
      form.set('price', String(order.price));
    }
    if (order.strategyId) {
      form.set('tag', order.strategyId.slice(0, 20));
    }

    const data = await this.request('POST', '/orders/regular', form);
    const parsed = OrderDataSchema.safeParse(data);
    if (!parsed.success) {
      throw new BrokerError('Kite order response carried no order_id');
    }

    this.logger.info('Order placed', { orderId: parsed.data.order_id, exchange, tradingsymbol, side: order.side, quantity: order.quantity });
    return { orderId: parsed.data.order_id, raw: data };
  }

  // ============ TRANSPORT ============

  private resolveInterval(interval: string): string {
    const mapped = KITE_INTERVALS[interval];
    if (mapped) return mapped;
    if (Object.values(KITE_INTERVALS).includes(interval)) return interval;
    throw new ConfigurationError(`Unsupported interval "${interval}"`);
  }

  private async request(method: 'GET' | 'POST', path: string, form?: URLSearchParams): Promise<unknown> {
    const headers: Record<string, string> = {
      'X-Kite-Version': '3',
      Authorization: this.session.authorizationHeader(),
    };
    if (form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }

    let response: Response;
    try {
      this.logger.debug('Kite request', { method, path });
      response = await fetch(`${this.baseUrl}${path}`, { method, headers, body: form?.toString() });
    } catch (error) {
      throw new BrokerError(`Kite request failed: ${errorMessage(error)}`);
    }

    const text = await response.text();
    const envelope = KiteEnvelopeSchema.safeParse(parseJson(text));

    if (!response.ok || !envelope.success || envelope.data.status === 'error') {
      const message = envelope.success && envelope.data.message ? envelope.data.message : `HTTP ${response.status} ${response.statusText}`;
      const errorType = envelope.success ? envelope.data.error_type : undefined;
      this.logger.warn('Kite request rejected', { method, path, status: response.status, errorType, message });
      throw new BrokerError(message, response.status, errorType);
    }

    return envelope.data.data;
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // Non-JSON bodies (gateway error pages) fail envelope validation
    return undefined;
  }
}
