/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      logLevel: 'info',
      logToFile: false,
      logDir: undefined,
      paperMode: true,
      broker: { apiKey: '', baseUrl: 'https://api.kite.trade' },
      runDefaults: { capital: 100_000, maxDailyLoss: 5000, allocation: 1 },
      maxOrdersPerMinute: 5,
      orderLimits: { maxQtyPerOrder: 1000, allowedSymbolSuffix: '.NS', maxDailyLoss: 0 },
      monitorPollIntervalMs: 1000,
      stopTimeoutMs: 5000,
    });
  });

  it('should read boolean flags as 1/true/yes', () => {
    expect(loadConfig({ PAPER_MODE: 'false' }).paperMode).toBe(false);
    expect(loadConfig({ PAPER_MODE: '0' }).paperMode).toBe(false);
    expect(loadConfig({ PAPER_MODE: 'YES' }).paperMode).toBe(true);
    expect(loadConfig({ LOG_TO_FILE: '1' }).logToFile).toBe(true);
  });

  it('should coerce numeric variables', () => {
    const config = loadConfig({
      MAX_ORDERS_PER_MINUTE: '10',
      MAX_QTY_PER_ORDER: '50',
      MAX_DAILY_LOSS: '2500.5',
      DEFAULT_ALLOCATION: '0.25',
    });

    expect(config.maxOrdersPerMinute).toBe(10);
    expect(config.orderLimits.maxQtyPerOrder).toBe(50);
    expect(config.orderLimits.maxDailyLoss).toBe(2500.5);
    expect(config.runDefaults.allocation).toBe(0.25);
  });

  it('should accept an upper-case log level', () => {
    expect(loadConfig({ LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
  });

  it('should allow disabling the symbol suffix check', () => {
    expect(loadConfig({ ALLOWED_SYMBOL_SUFFIX: '' }).orderLimits.allowedSymbolSuffix).toBe('');
  });

  it('should pass broker credentials through', () => {
    const config = loadConfig({ KITE_API_KEY: 'test-key', KITE_BASE_URL: 'http://localhost:9999' });

    expect(config.broker).toEqual({ apiKey: 'test-key', baseUrl: 'http://localhost:9999' });
  });

  it('should throw ConfigurationError naming the invalid variable', () => {
    expect(() => loadConfig({ MAX_ORDERS_PER_MINUTE: 'abc' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ MAX_ORDERS_PER_MINUTE: 'abc' })).toThrow(/MAX_ORDERS_PER_MINUTE/);
  });

  it('should reject an allocation outside (0, 1]', () => {
    expect(() => loadConfig({ DEFAULT_ALLOCATION: '1.5' })).toThrow(/DEFAULT_ALLOCATION/);
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });
});
