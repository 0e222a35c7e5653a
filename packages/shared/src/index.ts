/**
 * @crossover-bot/shared - Shared types, schemas, and utilities
 *
 * This package contains code shared between the backtest and execution sides of the trader.
 */

export * from './types/index.js';
export * from './schemas/index.js';
export * from './logger.js';
export * from './errors.js';
export * from './config.js';
export * from './utils/load-env.js';
