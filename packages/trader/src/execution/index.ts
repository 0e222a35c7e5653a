/**
 * Live execution: risk governor, order validation, rate limiting, trade journal
 */

export {
  ExecutionManager,
  type AcceptedOrder,
  type ExecutionManagerEvents,
  type ExecutionManagerOptions,
  type ExecutionStatus,
  type LiveRunInfo,
} from './execution-manager.js';
export { OrderRateLimiter, RATE_WINDOW_MS } from './order-rate-limiter.js';
export { OrderValidator, type ValidationResult } from './order-validator.js';
export { InMemoryTradeStore, startOfUtcDay, type TradeStore } from './trade-store.js';
