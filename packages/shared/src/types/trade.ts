/**
 * Trading types
 */

/**
 * Order side
 */
export type OrderSide = 'BUY' | 'SELL';

/**
 * Order type
 */
export type OrderType = 'MARKET' | 'LIMIT';

/**
 * Order request submitted to the execution manager
 */
export interface OrderRequest {
  /** Symbol including exchange suffix (e.g. "RELIANCE.NS") */
  symbol?: string;
  /** Side */
  side: OrderSide;
  /** Quantity (positive integer) */
  quantity: number;
  /** Order type */
  orderType: OrderType;
  /** Limit price (or reference price for paper fills) */
  price?: number;
  /** Product code understood by the broker (CNC, MIS, ...) */
  product?: string;
  /** Strategy that generated this order */
  strategyId?: string;
}

/**
 * Broker acknowledgement of a dispatched order
 */
export interface OrderAck {
  /** Broker order id */
  orderId: string;
  /** Raw broker payload */
  raw?: unknown;
}

/**
 * Status of a persisted trade record
 */
export type StoredTradeStatus = 'OPEN' | 'CLOSED' | 'SIMULATED';

/**
 * Trade record as kept by the trade store
 */
export interface StoredTrade {
  id: number;
  strategyId?: string;
  symbol: string;
  side: OrderSide;
  qty: number;
  entryPrice: number;
  exitPrice: number | null;
  pnl: number | null;
  status: StoredTradeStatus;
  /** Broker or paper order id */
  orderId?: string;
  /** Unix ms */
  createdAt: number;
}

/**
 * Input for appending a trade record
 */
export type NewStoredTrade = Omit<StoredTrade, 'id' | 'createdAt'> & { createdAt?: number };
