/**
 * Broker adapters, session and bar source
 */

export { BrokerSession, type BrokerSessionOptions } from './broker-session.js';
export {
  KiteRestAdapter,
  KITE_INTERVALS,
  DEFAULT_KITE_BASE_URL,
  toKiteInstrument,
  toKiteTimestamp,
  type KiteRestAdapterOptions,
} from './kite-rest-adapter.js';
export { CsvBarAdapter, type CsvBarAdapterOptions } from './csv-bar-adapter.js';
export { normalizeBar, normalizeBars, parseTimestampMs } from './bar-normalizer.js';
export { BarSource } from './bar-source.js';
