/**
 * Order validation
 *
 * Runs before any rate-limit or broker call, in paper and live mode alike.
 */

import { errorMessage, OrderPayloadSchema, type OrderLimits, type OrderRequest } from '@crossover-bot/shared';
import { startOfUtcDay, type TradeStore } from './trade-store.js';

export type ValidationResult = { ok: true; order: OrderRequest } | { ok: false; reason: string };

export class OrderValidator {
  constructor(
    private readonly limits: OrderLimits,
    private readonly tradeStore: TradeStore,
    private readonly now: () => number = Date.now
  ) {}

  async validate(payload: unknown): Promise<ValidationResult> {
    const parsed = OrderPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      const reason = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'order'}: ${issue.message}`).join('; ');
      return { ok: false, reason };
    }

    const order = parsed.data;
    const { maxQtyPerOrder, allowedSymbolSuffix, maxDailyLoss } = this.limits;

    if (!Number.isInteger(order.quantity) || order.quantity <= 0 || order.quantity > maxQtyPerOrder) {
      return { ok: false, reason: `qty ${order.quantity} invalid or exceeds max ${maxQtyPerOrder}` };
    }

    if (!order.symbol) {
      return { ok: false, reason: 'symbol missing' };
    }

    if (allowedSymbolSuffix && !order.symbol.endsWith(allowedSymbolSuffix)) {
      return { ok: false, reason: `symbol ${order.symbol} not allowed` };
    }

    if (maxDailyLoss > 0) {
      let realizedPnl: number;
      try {
        realizedPnl = await this.tradeStore.realizedPnlSince(startOfUtcDay(this.now()));
      } catch (error) {
        return { ok: false, reason: `daily loss unavailable: ${errorMessage(error)}` };
      }

      const dailyLoss = Math.max(0, -realizedPnl);
      if (dailyLoss >= maxDailyLoss) {
        return { ok: false, reason: `daily loss limit reached: ${dailyLoss} >= ${maxDailyLoss}` };
      }
    }

    return { ok: true, order };
  }
}
