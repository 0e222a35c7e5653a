/**
 * Schema Tests
 */

import { describe, it, expect } from 'vitest';
import { OrderPayloadSchema } from './order.schema.js';
import { BacktestRequestSchema, LiveRunParamsSchema, StrategyParamsSchema } from './strategy.schema.js';

describe('OrderPayloadSchema', () => {
  it('should apply side and order type defaults', () => {
    const order = OrderPayloadSchema.parse({ symbol: 'TCS.NS', quantity: 5 });

    expect(order).toEqual({ symbol: 'TCS.NS', side: 'BUY', quantity: 5, orderType: 'MARKET' });
  });

  it('should accept tradingsymbol as an alias of symbol', () => {
    const order = OrderPayloadSchema.parse({ tradingsymbol: 'INFY.NS', quantity: '3', side: 'SELL' });

    expect(order.symbol).toBe('INFY.NS');
    expect(order.quantity).toBe(3);
    expect(order.side).toBe('SELL');
  });

  it('should prefer symbol over tradingsymbol', () => {
    const order = OrderPayloadSchema.parse({ symbol: 'TCS.NS', tradingsymbol: 'INFY.NS', quantity: 1 });

    expect(order.symbol).toBe('TCS.NS');
  });

  it('should stringify numeric strategy ids', () => {
    expect(OrderPayloadSchema.parse({ symbol: 'TCS.NS', quantity: 1, strategyId: 42 }).strategyId).toBe('42');
  });

  it('should leave symbol undefined when absent', () => {
    expect(OrderPayloadSchema.parse({ quantity: 1 }).symbol).toBeUndefined();
  });

  it('should reject an unknown side', () => {
    expect(OrderPayloadSchema.safeParse({ symbol: 'TCS.NS', quantity: 1, side: 'HOLD' }).success).toBe(false);
  });
});

describe('StrategyParamsSchema', () => {
  it('should default allocationFraction to 1', () => {
    expect(StrategyParamsSchema.parse({ fastWindow: 2, slowWindow: 3 })).toEqual({
      fastWindow: 2,
      slowWindow: 3,
      allocationFraction: 1,
    });
  });

  it('should reject equal or inverted windows', () => {
    expect(StrategyParamsSchema.safeParse({ fastWindow: 3, slowWindow: 3 }).success).toBe(false);
    expect(StrategyParamsSchema.safeParse({ fastWindow: 5, slowWindow: 3 }).success).toBe(false);
  });

  it('should reject non-integer and non-positive windows', () => {
    expect(StrategyParamsSchema.safeParse({ fastWindow: 0, slowWindow: 3 }).success).toBe(false);
    expect(StrategyParamsSchema.safeParse({ fastWindow: 1.5, slowWindow: 3 }).success).toBe(false);
  });

  it('should reject allocation outside (0, 1]', () => {
    expect(StrategyParamsSchema.safeParse({ fastWindow: 2, slowWindow: 3, allocationFraction: 0 }).success).toBe(false);
    expect(StrategyParamsSchema.safeParse({ fastWindow: 2, slowWindow: 3, allocationFraction: 1.01 }).success).toBe(false);
  });
});

describe('BacktestRequestSchema', () => {
  it('should require symbol and interval', () => {
    const result = BacktestRequestSchema.safeParse({
      symbol: '',
      interval: '1d',
      strategyParams: { fastWindow: 2, slowWindow: 3 },
    });

    expect(result.success).toBe(false);
  });
});

describe('LiveRunParamsSchema', () => {
  it('should require a strategy id and leave the rest optional', () => {
    expect(LiveRunParamsSchema.parse({ strategyId: 'sma-2-3' })).toEqual({ strategyId: 'sma-2-3' });
    expect(LiveRunParamsSchema.safeParse({ capital: 1000 }).success).toBe(false);
  });
});
