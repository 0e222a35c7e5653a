/**
 * Execution Manager Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import {
  BrokerError,
  ConfigurationError,
  loadConfig,
  type BrokerAdapter,
  type OrderLimits,
  type OrderResult,
  type RunDefaults,
} from '@crossover-bot/shared';
import { ExecutionManager, type ExecutionManagerOptions } from './execution-manager.js';
import { InMemoryTradeStore, type TradeStore } from './trade-store.js';

const NOON = Date.UTC(2024, 4, 10, 12);
const RUN_DEFAULTS: RunDefaults = { capital: 100_000, maxDailyLoss: 5000, allocation: 1 };
const ORDER_LIMITS: OrderLimits = { maxQtyPerOrder: 100, allowedSymbolSuffix: '.NS', maxDailyLoss: 0 };

describe('ExecutionManager', () => {
  let store: InMemoryTradeStore;

  const createManager = (overrides: Partial<ExecutionManagerOptions> = {}) =>
    new ExecutionManager({
      tradeStore: store,
      paperMode: true,
      runDefaults: RUN_DEFAULTS,
      orderLimits: ORDER_LIMITS,
      maxOrdersPerMinute: 5,
      now: () => Date.now(),
      ...overrides,
    });

  const closeTradeWithPnl = (pnl: number) =>
    store.append({
      symbol: 'TCS.NS',
      side: 'BUY',
      qty: 1,
      entryPrice: 100,
      exitPrice: 100 + pnl,
      pnl,
      status: 'CLOSED',
      createdAt: NOON - 60_000,
    });

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOON);
    store = new InMemoryTradeStore(() => Date.now());
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('constructor', () => {
    it('should require a broker in live mode', () => {
      expect(() => createManager({ paperMode: false })).toThrow(ConfigurationError);
    });

    it('should require an order-capable broker in live mode', () => {
      const barsOnly: BrokerAdapter = {
        name: 'csv',
        capabilities: { bars: true, orders: false },
        getBars: vi.fn(),
        isAuthenticated: () => false,
        placeOrder: vi.fn(),
      };

      expect(() => createManager({ paperMode: false, broker: barsOnly })).toThrow(
        'Broker adapter "csv" does not support: orders'
      );
    });

    it('should build from configuration', () => {
      const manager = ExecutionManager.fromConfig(loadConfig({}), { tradeStore: store });

      expect(manager.getStatus()).toEqual({ state: 'idle', paperMode: true, run: null });
    });
  });

  describe('start/stop', () => {
    it('should start a run with configured defaults', () => {
      const manager = createManager();
      const onStarted = vi.fn();
      manager.on('run:started', onStarted);

      expect(manager.start({ strategyId: 'sma-2-3' })).toEqual({ ok: true, status: 'started' });

      const expectedRun = {
        strategyId: 'sma-2-3',
        capital: 100_000,
        maxDailyLoss: 5000,
        allocation: 1,
        startedAt: NOON,
        dailyPnl: 0,
      };
      expect(manager.getStatus()).toEqual({ state: 'running', paperMode: true, run: expectedRun });
      expect(onStarted).toHaveBeenCalledWith(expectedRun);
    });

    it('should reject a second start', () => {
      const manager = createManager();
      manager.start({ strategyId: 'sma-2-3' });

      expect(manager.start({ strategyId: 'other' })).toEqual({ ok: false, reason: 'already_running' });
      expect(manager.getStatus().run?.strategyId).toBe('sma-2-3');
    });

    it('should reject invalid params with a detail', () => {
      const manager = createManager();

      expect(manager.start({})).toEqual({ ok: false, reason: 'invalid_params', detail: 'strategyId: Required' });
      expect(manager.getStatus().state).toBe('idle');
    });

    it('should report not_running when idle', async () => {
      const manager = createManager();

      expect(await manager.stop()).toEqual({ ok: false, reason: 'not_running' });
    });

    it('should stop a running run', async () => {
      const manager = createManager();
      const onStopped = vi.fn();
      manager.on('run:stopped', onStopped);
      manager.start({ strategyId: 'sma-2-3' });

      expect(await manager.stop()).toEqual({ ok: true, status: 'stopped' });
      expect(manager.getStatus()).toEqual({ state: 'idle', paperMode: true, run: null });
      expect(onStopped).toHaveBeenCalledWith('manual', expect.objectContaining({ strategyId: 'sma-2-3' }));
    });

    it('should allow a new run after stopping', async () => {
      const manager = createManager();
      manager.start({ strategyId: 'first' });
      await manager.stop();

      expect(manager.start({ strategyId: 'second' })).toEqual({ ok: true, status: 'started' });
    });

    it('should stay in stopping while a tick is in flight, up to the timeout', async () => {
      const hanging: TradeStore = {
        append: vi.fn(),
        list: vi.fn(),
        realizedPnlSince: vi.fn(() => new Promise<number>(() => {})),
      };
      const manager = createManager({ tradeStore: hanging });
      manager.start({ strategyId: 'sma-2-3' });
      await vi.advanceTimersByTimeAsync(1000);

      const stopping = manager.stop();

      expect(manager.getStatus().state).toBe('stopping');
      expect(manager.start({ strategyId: 'other' })).toEqual({ ok: false, reason: 'stop_in_progress' });
      expect(await manager.stop()).toEqual({ ok: false, reason: 'stop_in_progress' });

      await vi.advanceTimersByTimeAsync(5000);

      expect(await stopping).toEqual({ ok: true, status: 'stopped' });
      expect(manager.getStatus().state).toBe('idle');
    });
  });

  describe('monitor loop', () => {
    it('should read the daily pnl once per poll interval', async () => {
      const spy = vi.spyOn(store, 'realizedPnlSince');
      const manager = createManager();
      manager.start({ strategyId: 'sma-2-3' });

      await vi.advanceTimersByTimeAsync(3000);

      expect(spy).toHaveBeenCalledTimes(3);
      expect(spy).toHaveBeenCalledWith(Date.UTC(2024, 4, 10));
    });

    it('should trigger the kill switch when the loss exceeds the limit', async () => {
      await closeTradeWithPnl(-150);
      const manager = createManager();
      const onKill = vi.fn();
      const onStopped = vi.fn();
      manager.on('killswitch:triggered', onKill);
      manager.on('run:stopped', onStopped);
      manager.start({ strategyId: 'sma-2-3', maxDailyLoss: 100 });

      await vi.advanceTimersByTimeAsync(1000);

      expect(manager.getStatus()).toEqual({ state: 'idle', paperMode: true, run: null });
      expect(onKill).toHaveBeenCalledWith(-150, expect.objectContaining({ strategyId: 'sma-2-3', dailyPnl: -150 }));
      expect(onStopped).toHaveBeenCalledWith('kill_switch', expect.objectContaining({ maxDailyLoss: 100 }));
      expect(await manager.stop()).toEqual({ ok: false, reason: 'not_running' });
    });

    it('should stop polling after the kill switch', async () => {
      await closeTradeWithPnl(-150);
      const spy = vi.spyOn(store, 'realizedPnlSince');
      const manager = createManager();
      manager.start({ strategyId: 'sma-2-3', maxDailyLoss: 100 });

      await vi.advanceTimersByTimeAsync(5000);

      expect(spy).toHaveBeenCalledTimes(1);
    });

    it('should keep running when the loss equals the limit', async () => {
      await closeTradeWithPnl(-100);
      const manager = createManager();
      manager.start({ strategyId: 'sma-2-3', maxDailyLoss: 100 });

      await vi.advanceTimersByTimeAsync(2000);

      expect(manager.getStatus().state).toBe('running');
      expect(manager.getStatus().run?.dailyPnl).toBe(-100);
    });

    it('should never trigger with a zero limit', async () => {
      await closeTradeWithPnl(-1_000_000);
      const manager = createManager();
      manager.start({ strategyId: 'sma-2-3', maxDailyLoss: 0 });

      await vi.advanceTimersByTimeAsync(2000);

      expect(manager.getStatus().state).toBe('running');
    });

    it('should ignore losses from previous days', async () => {
      await store.append({
        symbol: 'TCS.NS',
        side: 'BUY',
        qty: 1,
        entryPrice: 100,
        exitPrice: 0,
        pnl: -500,
        status: 'CLOSED',
        createdAt: Date.UTC(2024, 4, 9, 23),
      });
      const manager = createManager();
      manager.start({ strategyId: 'sma-2-3', maxDailyLoss: 100 });

      await vi.advanceTimersByTimeAsync(1000);

      expect(manager.getStatus().run?.dailyPnl).toBe(0);
    });

    it('should monitor a new run after stop timed out on a hung tick', async () => {
      await closeTradeWithPnl(-150);
      const spy = vi.spyOn(store, 'realizedPnlSince').mockImplementationOnce(() => new Promise<number>(() => {}));
      const manager = createManager();
      manager.start({ strategyId: 'first', maxDailyLoss: 0 });
      await vi.advanceTimersByTimeAsync(1000);

      const stopping = manager.stop();
      await vi.advanceTimersByTimeAsync(5000);
      expect(await stopping).toEqual({ ok: true, status: 'stopped' });

      manager.start({ strategyId: 'second', maxDailyLoss: 100 });
      await vi.advanceTimersByTimeAsync(1000);

      expect(spy).toHaveBeenCalledTimes(2);
      expect(manager.getStatus().state).toBe('idle');
    });

    it('should go idle even when a kill switch listener throws', async () => {
      await closeTradeWithPnl(-150);
      const manager = createManager();
      manager.on('killswitch:triggered', () => {
        throw new Error('listener failed');
      });
      manager.start({ strategyId: 'sma-2-3', maxDailyLoss: 100 });

      await vi.advanceTimersByTimeAsync(1000);

      expect(manager.getStatus()).toEqual({ state: 'idle', paperMode: true, run: null });
      expect(manager.start({ strategyId: 'sma-2-3' })).toEqual({ ok: true, status: 'started' });
    });

    it('should keep running when a tick fails', async () => {
      const spy = vi.spyOn(store, 'realizedPnlSince').mockRejectedValueOnce(new Error('store offline'));
      const manager = createManager();
      manager.start({ strategyId: 'sma-2-3' });

      await vi.advanceTimersByTimeAsync(2000);

      expect(manager.getStatus().state).toBe('running');
      expect(spy).toHaveBeenCalledTimes(2);
    });
  });

  describe('paper orders', () => {
    it('should fill with a PAPER id and record a simulated trade', async () => {
      const manager = createManager();

      const result = await manager.submitOrder({ symbol: 'TCS.NS', side: 'BUY', quantity: 10, price: 3500 });

      expect(result).toEqual({ ok: true, simulated: true, orderId: 'PAPER-1' });
      const [trade] = await store.list();
      expect(trade).toMatchObject({
        symbol: 'TCS.NS',
        side: 'BUY',
        qty: 10,
        entryPrice: 3500,
        pnl: 0,
        status: 'SIMULATED',
        createdAt: NOON,
      });
    });

    it('should tag orders with the active strategy', async () => {
      const manager = createManager();
      manager.start({ strategyId: 'sma-2-3' });

      await manager.submitOrder({ symbol: 'TCS.NS', quantity: 1 });

      const [trade] = await store.list();
      expect(trade.strategyId).toBe('sma-2-3');
    });

    it('should not apply the rate limiter', async () => {
      const manager = createManager({ maxOrdersPerMinute: 1 });

      const results: OrderResult[] = [];
      for (let i = 0; i < 3; i++) {
        results.push(await manager.submitOrder({ symbol: 'TCS.NS', quantity: 1 }));
      }

      expect(results.map((r) => r.ok && r.orderId)).toEqual(['PAPER-1', 'PAPER-2', 'PAPER-3']);
    });

    it('should still succeed when the fill cannot be recorded', async () => {
      vi.spyOn(store, 'append').mockRejectedValueOnce(new Error('disk full'));
      const manager = createManager();

      const result = await manager.submitOrder({ symbol: 'TCS.NS', quantity: 1 });

      expect(result).toEqual({ ok: true, simulated: true, orderId: `PAPER-${NOON}` });
    });

    it('should reject invalid orders and emit the rejection', async () => {
      const manager = createManager();
      const onRejected = vi.fn();
      manager.on('order:rejected', onRejected);

      const result = await manager.submitOrder({ symbol: 'TCS.NS', quantity: 0 });

      expect(result).toEqual({ ok: false, error: 'validation_failed', reason: 'qty 0 invalid or exceeds max 100' });
      expect(onRejected).toHaveBeenCalledWith('validation_failed', 'qty 0 invalid or exceeds max 100');
      expect(await store.list()).toHaveLength(0);
    });
  });

  describe('live orders', () => {
    let placeOrder: Mock;
    let authenticated: boolean;
    let broker: BrokerAdapter;

    const liveManager = (maxOrdersPerMinute = 2) =>
      createManager({ paperMode: false, broker, maxOrdersPerMinute });

    beforeEach(() => {
      authenticated = true;
      let nextOrder = 1;
      placeOrder = vi.fn(async () => {
        const orderId = `ORD-${nextOrder++}`;
        return { orderId, raw: { order_id: orderId } };
      });
      broker = {
        name: 'kite',
        capabilities: { bars: true, orders: true },
        getBars: vi.fn(),
        isAuthenticated: () => authenticated,
        placeOrder,
      };
    });

    it('should dispatch to the broker and journal an open trade', async () => {
      const manager = liveManager();
      const onAccepted = vi.fn();
      manager.on('order:accepted', onAccepted);

      const result = await manager.submitOrder({ symbol: 'TCS.NS', side: 'SELL', quantity: 5 });

      expect(result).toEqual({ ok: true, simulated: false, orderId: 'ORD-1', raw: { order_id: 'ORD-1' } });
      expect(placeOrder).toHaveBeenCalledWith(
        expect.objectContaining({ symbol: 'TCS.NS', side: 'SELL', quantity: 5, orderType: 'MARKET' })
      );
      expect(onAccepted).toHaveBeenCalledWith(result, expect.objectContaining({ symbol: 'TCS.NS' }));

      const [trade] = await store.list();
      expect(trade).toMatchObject({ status: 'OPEN', orderId: 'ORD-1', qty: 5, side: 'SELL' });
    });

    it('should rate limit after N orders and recover after a minute', async () => {
      const manager = liveManager(2);

      await manager.submitOrder({ symbol: 'TCS.NS', quantity: 1 });
      await manager.submitOrder({ symbol: 'TCS.NS', quantity: 1 });
      const limited = await manager.submitOrder({ symbol: 'TCS.NS', quantity: 1 });

      expect(limited).toEqual({ ok: false, error: 'rate_limited', reason: 'more than 2 orders in the last minute' });
      expect(placeOrder).toHaveBeenCalledTimes(2);

      vi.advanceTimersByTime(61_000);

      expect(await manager.submitOrder({ symbol: 'TCS.NS', quantity: 1 })).toMatchObject({ ok: true, orderId: 'ORD-3' });
    });

    it('should reject when the session is not authenticated without using the rate budget', async () => {
      authenticated = false;
      const manager = liveManager(2);

      for (let i = 0; i < 3; i++) {
        expect(await manager.submitOrder({ symbol: 'TCS.NS', quantity: 1 })).toEqual({
          ok: false,
          error: 'not_authenticated',
          reason: 'broker session is not authenticated',
        });
      }
      expect(placeOrder).not.toHaveBeenCalled();

      authenticated = true;
      expect((await manager.submitOrder({ symbol: 'TCS.NS', quantity: 1 })).ok).toBe(true);
      expect((await manager.submitOrder({ symbol: 'TCS.NS', quantity: 1 })).ok).toBe(true);
    });

    it('should pass the broker error message through', async () => {
      placeOrder.mockRejectedValueOnce(new BrokerError('Insufficient funds', 400, 'InputException'));
      const manager = liveManager();

      const result = await manager.submitOrder({ symbol: 'TCS.NS', quantity: 1 });

      expect(result).toEqual({ ok: false, error: 'broker_error', reason: 'Insufficient funds' });
      expect(await store.list()).toHaveLength(0);
    });

    it('should validate before touching the broker', async () => {
      const manager = liveManager();

      const result = await manager.submitOrder({ symbol: 'TCS.BO', quantity: 1 });

      expect(result).toEqual({ ok: false, error: 'validation_failed', reason: 'symbol TCS.BO not allowed' });
      expect(placeOrder).not.toHaveBeenCalled();
    });
  });
});
