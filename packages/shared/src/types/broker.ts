/**
 * Broker adapter contract
 */

import type { BarRequest } from './market.js';
import type { OrderAck, OrderRequest } from './trade.js';

/**
 * Operations an adapter actually supports
 */
export interface BrokerCapabilities {
  /** Historical bars */
  bars: boolean;
  /** Live order placement */
  orders: boolean;
}

export type BrokerCapability = keyof BrokerCapabilities;

/**
 * Single capability interface every broker adapter implements.
 *
 * getBars returns upstream rows as-is (positional arrays or keyed records);
 * normalization to Bar happens in the bar source. Operations an adapter does
 * not support throw ConfigurationError, and callers check `capabilities` at
 * startup instead of probing per call.
 */
export interface BrokerAdapter {
  readonly name: string;
  readonly capabilities: BrokerCapabilities;
  getBars(request: BarRequest): Promise<readonly unknown[]>;
  isAuthenticated(): boolean;
  placeOrder(order: OrderRequest): Promise<OrderAck>;
}
