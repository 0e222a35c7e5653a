/**
 * Position Ledger
 *
 * Cash, the single open position and the closed trade list for one
 * simulated run. Long-only, one position at a time.
 */

import type { Bar, ClosedTrade, EquityPoint, OpenTrade } from '../types.js';

export class PositionLedger {
  private _cash: number;
  private openTrade: OpenTrade | null = null;
  private closedTrades: ClosedTrade[] = [];
  private equityPoints: EquityPoint[] = [];

  constructor(
    private readonly symbol: string,
    initialCapital: number,
    private readonly allocationFraction: number = 1
  ) {
    if (!(initialCapital >= 0)) {
      throw new RangeError(`initialCapital must be >= 0, got ${initialCapital}`);
    }
    if (!(allocationFraction > 0 && allocationFraction <= 1)) {
      throw new RangeError(`allocationFraction must be in (0, 1], got ${allocationFraction}`);
    }
    this._cash = initialCapital;
  }

  get cash(): number {
    return this._cash;
  }

  get positionQty(): number {
    return this.openTrade ? this.openTrade.qty : 0;
  }

  get isOpen(): boolean {
    return this.openTrade !== null;
  }

  get trades(): readonly ClosedTrade[] {
    return this.closedTrades;
  }

  get equityCurve(): readonly EquityPoint[] {
    return this.equityPoints;
  }

  /**
   * Open a position at the bar close with floor(cash * allocation / close) units.
   * Returns null (no-op) when already open or the quantity rounds to zero.
   */
  enter(bar: Bar): OpenTrade | null {
    if (this.openTrade) return null;

    const capitalToDeploy = this._cash * this.allocationFraction;
    const qty = bar.close > 0 ? Math.floor(capitalToDeploy / bar.close) : 0;
    if (qty <= 0) return null;

    this._cash -= qty * bar.close;
    this.openTrade = {
      symbol: this.symbol,
      side: 'BUY',
      qty,
      entryTime: bar.timestamp,
      entryPrice: bar.close,
      status: 'OPEN',
      exitTime: null,
      exitPrice: null,
      pnl: null,
    };
    return this.openTrade;
  }

  /**
   * Close the open position at the bar close. Returns null when flat.
   */
  exit(bar: Bar): ClosedTrade | null {
    const open = this.openTrade;
    if (!open) return null;

    this._cash += open.qty * bar.close;
    const closed: ClosedTrade = {
      ...open,
      status: 'CLOSED',
      exitTime: bar.timestamp,
      exitPrice: bar.close,
      pnl: (bar.close - open.entryPrice) * open.qty,
    };
    this.closedTrades.push(closed);
    this.openTrade = null;
    return closed;
  }

  /**
   * Value cash plus the open position at the bar close and append it to the curve
   */
  markToMarket(bar: Bar): EquityPoint {
    const positionValue = this.openTrade ? this.openTrade.qty * bar.close : 0;
    const point: EquityPoint = { timestamp: bar.timestamp, equity: this._cash + positionValue };
    this.equityPoints.push(point);
    return point;
  }
}
