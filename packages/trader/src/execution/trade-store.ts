/**
 * Trade store
 *
 * Append-only journal of live and simulated trades. The execution manager
 * reads today's realized pnl from it and never caches it across ticks.
 */

import type { NewStoredTrade, StoredTrade } from '@crossover-bot/shared';

export interface TradeStore {
  append(trade: NewStoredTrade): Promise<StoredTrade>;
  /** Sum of pnl over CLOSED trades created at or after `sinceMs` */
  realizedPnlSince(sinceMs: number): Promise<number>;
  list(): Promise<StoredTrade[]>;
}

/**
 * 00:00 UTC of the day containing `ms`
 */
export function startOfUtcDay(ms: number): number {
  const date = new Date(ms);
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

export class InMemoryTradeStore implements TradeStore {
  private readonly trades: StoredTrade[] = [];
  private nextId = 1;

  constructor(private readonly now: () => number = Date.now) {}

  async append(trade: NewStoredTrade): Promise<StoredTrade> {
    const stored: StoredTrade = {
      ...trade,
      id: this.nextId++,
      createdAt: trade.createdAt ?? this.now(),
    };
    this.trades.push(stored);
    return { ...stored };
  }

  async realizedPnlSince(sinceMs: number): Promise<number> {
    return this.trades
      .filter((t) => t.status === 'CLOSED' && t.createdAt >= sinceMs)
      .reduce((sum, t) => sum + (t.pnl ?? 0), 0);
  }

  async list(): Promise<StoredTrade[]> {
    return this.trades.map((t) => ({ ...t }));
  }
}
