export * from './bar.schema.js';
export * from './strategy.schema.js';
export * from './order.schema.js';
