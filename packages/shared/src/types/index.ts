/**
 * Shared types
 */

export * from './market.js';
export * from './trade.js';
export * from './execution.js';
export * from './broker.js';
