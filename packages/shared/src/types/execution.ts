/**
 * Execution and live-run result types
 */

/**
 * Live-run state machine states
 */
export type RunState = 'idle' | 'running' | 'stopping';

/**
 * Why a live run ended
 */
export type StopReason = 'manual' | 'kill_switch';

/**
 * Result of a live-run control call (start/stop)
 */
export type ControlResult =
  | { ok: true; status: 'started' | 'stopped' }
  | { ok: false; reason: 'already_running' | 'not_running' | 'stop_in_progress' | 'invalid_params'; detail?: string };

/**
 * Machine-readable order rejection reasons
 */
export type OrderRejection = 'validation_failed' | 'rate_limited' | 'not_authenticated' | 'broker_error';

/**
 * Result of an order submission
 */
export type OrderResult =
  | { ok: true; simulated: true; orderId: string }
  | { ok: true; simulated: false; orderId: string; raw?: unknown }
  | { ok: false; error: OrderRejection; reason?: string };
