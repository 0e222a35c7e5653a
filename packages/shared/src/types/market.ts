/**
 * Market data types
 */

/**
 * One OHLCV sample for a fixed interval
 */
export interface Bar {
  /** Bar open time (Unix timestamp in milliseconds) */
  timestamp: number;
  /** Opening price */
  open: number;
  /** Highest price */
  high: number;
  /** Lowest price */
  low: number;
  /** Closing price */
  close: number;
  /** Traded volume (0 when the upstream omits it) */
  volume: number;
}

/**
 * Historical bar request sent to a broker adapter
 */
export interface BarRequest {
  /** Symbol (e.g. "RELIANCE.NS") */
  symbol: string;
  /** Interval alias (e.g. "5m", "1d") */
  interval: string;
  /** Range start (ISO-8601 or Unix ms) */
  from?: string | number;
  /** Range end (ISO-8601 or Unix ms) */
  to?: string | number;
}
