import { ExitReason, Order, Trade } from '../types/trading';
import { ClosedPosition, EquityPoint, OpenPosition, PositionSlot } from './types';

export const calculatePnl = (position: Pick<OpenPosition, 'order' | 'entryPrice'>, exitPrice: number): number => {
  const { direction, size } = position.order;
  const priceDiff = direction === 'LONG' ? exitPrice - position.entryPrice : position.entryPrice - exitPrice;
  return priceDiff * size;
};

/**
 * Single position slot, trade ledger and equity curve of one backtest run.
 */
export class Portfolio {
  private slot: PositionSlot = { status: 'FLAT' };
  private nextId = 1;
  private readonly closed: ClosedPosition[] = [];
  public readonly tradeHistory: Trade[] = [];
  public readonly equityCurve: EquityPoint[] = [];

  public get position(): PositionSlot {
    return this.slot;
  }

  public get closedPositions(): readonly ClosedPosition[] {
    return this.closed;
  }

  public openPosition(order: Order, fillPrice: number, entryTime: number): OpenPosition {
    if (this.slot.status !== 'FLAT') {
      throw new Error(`Cannot open a position while #${this.slot.id} is still open`);
    }
    const position: OpenPosition = Object.freeze({
      status: 'OPEN',
      id: this.nextId++,
      order,
      entryPrice: fillPrice,
      entryTime,
    });
    this.slot = position;
    return position;
  }

  public closePosition(exitPrice: number, exitTime: number, reason: ExitReason): ClosedPosition {
    const position = this.slot;
    if (position.status !== 'OPEN') {
      throw new Error('No open position to close');
    }

    const pnl = calculatePnl(position, exitPrice);
    const notional = position.entryPrice * position.order.size;

    const trade: Trade = Object.freeze({
      id: position.id,
      direction: position.order.direction,
      entryPrice: position.entryPrice,
      exitPrice,
      size: position.order.size,
      pnl,
      pnlPercent: notional > 0 ? (pnl / notional) * 100 : 0,
      entryTime: position.entryTime,
      exitTime,
      exitReason: reason,
      durationMinutes: (exitTime - position.entryTime) / 60000,
      stopLoss: position.order.stopLoss,
      takeProfit: position.order.takeProfit,
    });

    const closed: ClosedPosition = Object.freeze({ status: 'CLOSED', id: position.id, order: position.order, trade });
    this.closed.push(closed);
    this.tradeHistory.push(trade);
    this.slot = { status: 'FLAT' };
    return closed;
  }

  public unrealizedPnl(markPrice: number): number {
    return this.slot.status === 'OPEN' ? calculatePnl(this.slot, markPrice) : 0;
  }

  public recordEquity(timestamp: number, equity: number): void {
    this.equityCurve.push(Object.freeze({ timestamp, equity }));
  }
}
