/**
 * Backtest Engine - Core Components
 */

export { PositionLedger } from './position-ledger.js';
