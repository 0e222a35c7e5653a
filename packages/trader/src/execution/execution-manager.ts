/**
 * Execution Manager
 *
 * Risk governor for live runs. Owns the Idle/Running/Stopping state
 * machine, the daily-loss monitor loop (kill switch) and the order path:
 * validation, paper fills, rate limiting and broker dispatch.
 */

import { EventEmitter } from 'events';
import {
  assertCapabilities,
  ConfigurationError,
  createLogger,
  errorMessage,
  LiveRunParamsSchema,
  type AppConfig,
  type BrokerAdapter,
  type ControlResult,
  type Logger,
  type OrderAck,
  type OrderLimits,
  type OrderRejection,
  type OrderRequest,
  type OrderResult,
  type RunDefaults,
  type RunState,
  type StopReason,
} from '@crossover-bot/shared';
import { OrderRateLimiter } from './order-rate-limiter.js';
import { OrderValidator } from './order-validator.js';
import { startOfUtcDay, type TradeStore } from './trade-store.js';

/**
 * Parameters and live figures of the active run
 */
export interface LiveRunInfo {
  strategyId: string;
  capital: number;
  /** Kill-switch threshold; 0 disables it */
  maxDailyLoss: number;
  allocation: number;
  /** Unix ms */
  startedAt: number;
  /** Realized pnl since 00:00 UTC as of the last monitor tick */
  dailyPnl: number;
}

export interface ExecutionStatus {
  state: RunState;
  paperMode: boolean;
  run: LiveRunInfo | null;
}

export type AcceptedOrder = Extract<OrderResult, { ok: true }>;

/**
 * Execution Manager Events
 */
export interface ExecutionManagerEvents {
  'run:started': (run: LiveRunInfo) => void;
  'run:stopped': (reason: StopReason, run: LiveRunInfo) => void;
  'killswitch:triggered': (dailyPnl: number, run: LiveRunInfo) => void;
  'order:accepted': (result: AcceptedOrder, order: OrderRequest) => void;
  'order:rejected': (error: OrderRejection, reason: string | undefined) => void;
}

export interface ExecutionManagerOptions {
  tradeStore: TradeStore;
  /** Required unless paperMode; must support orders */
  broker?: BrokerAdapter;
  paperMode: boolean;
  runDefaults: RunDefaults;
  orderLimits: OrderLimits;
  maxOrdersPerMinute: number;
  /** Monitor tick (default 1000ms) */
  pollIntervalMs?: number;
  /** Longest stop() waits for an in-flight tick (default 5000ms) */
  stopTimeoutMs?: number;
  /** Clock (Unix ms), injectable for tests */
  now?: () => number;
  logger?: Logger;
}

/**
 * Execution Manager
 *
 * @example
 * ```typescript
 * const manager = ExecutionManager.fromConfig(loadConfig(), { tradeStore: new InMemoryTradeStore() });
 *
 * manager.on('killswitch:triggered', (dailyPnl) => {
 *   logger.error('Run halted', { dailyPnl });
 * });
 *
 * manager.start({ strategyId: 'sma-2-3', maxDailyLoss: 100 });
 * const result = await manager.submitOrder({ symbol: 'RELIANCE.NS', side: 'BUY', quantity: 1 });
 * await manager.stop();
 * ```
 */
export class ExecutionManager extends EventEmitter {
  private state: RunState = 'idle';
  private run: LiveRunInfo | null = null;
  private timerId: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  private readonly tradeStore: TradeStore;
  private readonly broker: BrokerAdapter | undefined;
  private readonly paperMode: boolean;
  private readonly runDefaults: RunDefaults;
  private readonly rateLimiter: OrderRateLimiter;
  private readonly validator: OrderValidator;
  private readonly pollIntervalMs: number;
  private readonly stopTimeoutMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  /**
   * @throws ConfigurationError in live mode without an order-capable broker
   */
  constructor(options: ExecutionManagerOptions) {
    super();
    this.tradeStore = options.tradeStore;
    this.broker = options.broker;
    this.paperMode = options.paperMode;
    this.runDefaults = options.runDefaults;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 5000;
    this.now = options.now ?? Date.now;
    this.logger = (options.logger ?? createLogger({ service: 'trader', silent: true })).child({
      component: 'execution-manager',
    });

    if (!this.paperMode) {
      if (!this.broker) {
        throw new ConfigurationError('Live mode requires a broker adapter');
      }
      assertCapabilities(this.broker, ['orders']);
    }

    this.rateLimiter = new OrderRateLimiter(options.maxOrdersPerMinute, this.now);
    this.validator = new OrderValidator(options.orderLimits, this.tradeStore, this.now);
  }

  static fromConfig(
    config: AppConfig,
    deps: { tradeStore: TradeStore; broker?: BrokerAdapter; logger?: Logger; now?: () => number }
  ): ExecutionManager {
    return new ExecutionManager({
      ...deps,
      paperMode: config.paperMode,
      runDefaults: config.runDefaults,
      orderLimits: config.orderLimits,
      maxOrdersPerMinute: config.maxOrdersPerMinute,
      pollIntervalMs: config.monitorPollIntervalMs,
      stopTimeoutMs: config.stopTimeoutMs,
    });
  }

  // ============ LIVE RUN CONTROL ============

  /**
   * Idle -> Running. Omitted params fall back to the configured defaults.
   */
  start(params: unknown): ControlResult {
    if (this.state === 'stopping') {
      return { ok: false, reason: 'stop_in_progress' };
    }
    if (this.state === 'running') {
      return { ok: false, reason: 'already_running' };
    }

    const parsed = LiveRunParamsSchema.safeParse(params);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`).join('; ');
      return { ok: false, reason: 'invalid_params', detail };
    }

    const run: LiveRunInfo = {
      strategyId: parsed.data.strategyId,
      capital: parsed.data.capital ?? this.runDefaults.capital,
      maxDailyLoss: parsed.data.maxDailyLoss ?? this.runDefaults.maxDailyLoss,
      allocation: parsed.data.allocation ?? this.runDefaults.allocation,
      startedAt: this.now(),
      dailyPnl: 0,
    };

    this.run = run;
    this.state = 'running';
    this.timerId = setInterval(() => {
      this.scheduleTick();
    }, this.pollIntervalMs);

    this.logger.info('Live run started', { ...run, paperMode: this.paperMode, pollIntervalMs: this.pollIntervalMs });
    this.emit('run:started', { ...run });
    return { ok: true, status: 'started' };
  }

  /**
   * Running -> Stopping -> Idle. Waits at most stopTimeoutMs for an
   * in-flight monitor tick.
   */
  async stop(): Promise<ControlResult> {
    if (this.state === 'stopping') {
      return { ok: false, reason: 'stop_in_progress' };
    }
    const run = this.run;
    if (this.state === 'idle' || !run) {
      return { ok: false, reason: 'not_running' };
    }

    this.state = 'stopping';
    this.clearTimer();

    const pending = this.inFlight;
    if (pending) {
      const finished = await waitFor(pending, this.stopTimeoutMs);
      if (!finished) {
        this.logger.warn('Monitor tick did not finish before stop timeout', { stopTimeoutMs: this.stopTimeoutMs });
      }
    }

    this.finish('manual', run);
    return { ok: true, status: 'stopped' };
  }

  getStatus(): ExecutionStatus {
    return {
      state: this.state,
      paperMode: this.paperMode,
      run: this.run ? { ...this.run } : null,
    };
  }

  // ============ MONITOR LOOP ============

  private scheduleTick(): void {
    // Skip while the previous tick is still reading the store
    if (this.inFlight) return;
    const tick: Promise<void> = this.tick().finally(() => {
      // finish() may have dropped this tick already
      if (this.inFlight === tick) this.inFlight = null;
    });
    this.inFlight = tick;
  }

  private async tick(): Promise<void> {
    const run = this.run;
    if (this.state !== 'running' || !run) return;

    try {
      const dailyPnl = await this.tradeStore.realizedPnlSince(startOfUtcDay(this.now()));

      // stop() or a new run may have happened while awaiting
      if (this.state !== 'running' || this.run !== run) return;

      run.dailyPnl = dailyPnl;
      this.logger.debug('Monitor tick', { strategyId: run.strategyId, dailyPnl });

      if (run.maxDailyLoss > 0 && dailyPnl < -run.maxDailyLoss) {
        this.triggerKillSwitch(run, dailyPnl);
      }
    } catch (error) {
      this.logger.error('Monitor tick failed', { strategyId: run.strategyId, error: errorMessage(error) });
    }
  }

  // Halts in place; does not go through stop(), which would wait on this tick.
  // State is idle before any listener runs.
  private triggerKillSwitch(run: LiveRunInfo, dailyPnl: number): void {
    this.logger.error('Kill switch triggered: daily loss limit breached', {
      strategyId: run.strategyId,
      dailyPnl,
      maxDailyLoss: run.maxDailyLoss,
    });
    this.clearTimer();
    this.finish('kill_switch', run);
    this.emit('killswitch:triggered', dailyPnl, { ...run });
  }

  private finish(reason: StopReason, run: LiveRunInfo): void {
    this.state = 'idle';
    this.run = null;
    // Drop a tick abandoned by a timed-out stop()
    this.inFlight = null;
    this.logger.info('Live run stopped', { strategyId: run.strategyId, reason, dailyPnl: run.dailyPnl });
    this.emit('run:stopped', reason, { ...run });
  }

  private clearTimer(): void {
    if (this.timerId) {
      clearInterval(this.timerId);
      this.timerId = null;
    }
  }

  // ============ ORDERS ============

  /**
   * Validate and route an order.
   *
   * Paper mode records a simulated fill and always succeeds. Live mode
   * checks the rate limiter and the broker session, then dispatches.
   */
  async submitOrder(payload: unknown): Promise<OrderResult> {
    const validation = await this.validator.validate(payload);
    if (!validation.ok) {
      return this.reject('validation_failed', validation.reason);
    }

    const order: OrderRequest = {
      ...validation.order,
      strategyId: validation.order.strategyId ?? this.run?.strategyId,
    };

    if (this.paperMode) {
      return this.fillPaperOrder(order);
    }

    const broker = this.broker;
    if (!broker) {
      return this.reject('not_authenticated', 'no broker configured');
    }

    if (!this.rateLimiter.allow()) {
      return this.reject('rate_limited', `more than ${this.rateLimiter.maxPerMinute} orders in the last minute`);
    }

    if (!broker.isAuthenticated()) {
      return this.reject('not_authenticated', 'broker session is not authenticated');
    }

    this.rateLimiter.record();

    let ack: OrderAck;
    try {
      ack = await broker.placeOrder(order);
    } catch (error) {
      return this.reject('broker_error', errorMessage(error));
    }

    try {
      await this.tradeStore.append({
        strategyId: order.strategyId,
        symbol: order.symbol ?? '',
        side: order.side,
        qty: order.quantity,
        entryPrice: order.price ?? 0,
        exitPrice: null,
        pnl: null,
        status: 'OPEN',
        orderId: ack.orderId,
        createdAt: this.now(),
      });
    } catch (error) {
      this.logger.error('Failed to journal live order', { orderId: ack.orderId, error: errorMessage(error) });
    }

    const result: AcceptedOrder = { ok: true, simulated: false, orderId: ack.orderId, raw: ack.raw };
    this.logger.info('Order dispatched', { orderId: ack.orderId, symbol: order.symbol, side: order.side, quantity: order.quantity });
    this.emit('order:accepted', result, order);
    return result;
  }

  private async fillPaperOrder(order: OrderRequest): Promise<OrderResult> {
    let orderId: string;
    try {
      const stored = await this.tradeStore.append({
        strategyId: order.strategyId,
        symbol: order.symbol ?? '',
        side: order.side,
        qty: order.quantity,
        entryPrice: order.price ?? 0,
        exitPrice: null,
        pnl: 0,
        status: 'SIMULATED',
        createdAt: this.now(),
      });
      orderId = `PAPER-${stored.id}`;
    } catch (error) {
      orderId = `PAPER-${this.now()}`;
      this.logger.error('Failed to record paper fill', { orderId, error: errorMessage(error) });
    }

    const result: AcceptedOrder = { ok: true, simulated: true, orderId };
    this.logger.info('Paper order filled', { orderId, symbol: order.symbol, side: order.side, quantity: order.quantity });
    this.emit('order:accepted', result, order);
    return result;
  }

  private reject(error: OrderRejection, reason: string): OrderResult {
    this.logger.warn('Order rejected', { error, reason });
    this.emit('order:rejected', error, reason);
    return { ok: false, error, reason };
  }

  /**
   * Type-safe event listener
   */
  override on<K extends keyof ExecutionManagerEvents>(event: K, listener: ExecutionManagerEvents[K]): this {
    return super.on(event, listener);
  }

  /**
   * Type-safe event emitter
   */
  override emit<K extends keyof ExecutionManagerEvents>(
    event: K,
    ...args: Parameters<ExecutionManagerEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}

/**
 * Resolve true when `promise` settles within `timeoutMs`, false otherwise
 */
async function waitFor(promise: Promise<void>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
