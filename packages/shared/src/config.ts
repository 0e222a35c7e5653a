/**
 * Application configuration
 *
 * Reads process environment (after loadEnvFromRoot) and validates it with zod.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { LogLevel } from './logger.js';

const envFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === '' ? fallback : ['1', 'true', 'yes'].includes(value.toLowerCase())));

const EnvSchema = z.object({
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['error', 'warn', 'info', 'debug'])),
  LOG_TO_FILE: envFlag(false),
  LOG_DIR: z.string().optional(),

  PAPER_MODE: envFlag(true),

  KITE_API_KEY: z.string().default(''),
  KITE_BASE_URL: z.string().url().default('https://api.kite.trade'),

  DEFAULT_CAPITAL: z.coerce.number().positive().default(100_000),
  DEFAULT_MAX_DAILY_LOSS: z.coerce.number().nonnegative().default(5000),
  DEFAULT_ALLOCATION: z.coerce.number().gt(0).lte(1).default(1),

  MAX_ORDERS_PER_MINUTE: z.coerce.number().int().positive().default(5),
  MAX_QTY_PER_ORDER: z.coerce.number().int().positive().default(1000),
  ALLOWED_SYMBOL_SUFFIX: z.string().default('.NS'),
  MAX_DAILY_LOSS: z.coerce.number().nonnegative().default(0),

  MONITOR_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  STOP_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

/**
 * Live-run defaults used when start() omits a value
 */
export interface RunDefaults {
  capital: number;
  maxDailyLoss: number;
  allocation: number;
}

/**
 * Per-order validation limits
 */
export interface OrderLimits {
  /** Largest quantity accepted in one order */
  maxQtyPerOrder: number;
  /** Required symbol suffix; empty string disables the check */
  allowedSymbolSuffix: string;
  /** Realized daily loss cap; 0 disables the check */
  maxDailyLoss: number;
}

export interface AppConfig {
  logLevel: LogLevel;
  logToFile: boolean;
  logDir?: string;
  paperMode: boolean;
  broker: {
    apiKey: string;
    baseUrl: string;
  };
  runDefaults: RunDefaults;
  maxOrdersPerMinute: number;
  orderLimits: OrderLimits;
  monitorPollIntervalMs: number;
  stopTimeoutMs: number;
}

/**
 * Load configuration from environment
 *
 * @throws ConfigurationError naming the offending variable(s)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${details}`);
  }

  const e = parsed.data;

  return {
    logLevel: e.LOG_LEVEL,
    logToFile: e.LOG_TO_FILE,
    logDir: e.LOG_DIR,
    paperMode: e.PAPER_MODE,
    broker: {
      apiKey: e.KITE_API_KEY,
      baseUrl: e.KITE_BASE_URL,
    },
    runDefaults: {
      capital: e.DEFAULT_CAPITAL,
      maxDailyLoss: e.DEFAULT_MAX_DAILY_LOSS,
      allocation: e.DEFAULT_ALLOCATION,
    },
    maxOrdersPerMinute: e.MAX_ORDERS_PER_MINUTE,
    orderLimits: {
      maxQtyPerOrder: e.MAX_QTY_PER_ORDER,
      allowedSymbolSuffix: e.ALLOWED_SYMBOL_SUFFIX,
      maxDailyLoss: e.MAX_DAILY_LOSS,
    },
    monitorPollIntervalMs: e.MONITOR_POLL_INTERVAL_MS,
    stopTimeoutMs: e.STOP_TIMEOUT_MS,
  };
}
