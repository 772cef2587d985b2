import { AccountState } from '../types/trading';

/**
 * UTC calendar date of a bar, used as the trading-day key.
 */
export const tradingDayOf = (timestamp: number): string => new Date(timestamp).toISOString().slice(0, 10);

interface MutableAccountState {
  initialCapital: number;
  equity: number;
  dailyLossAccumulated: number;
  tradesTodayCount: number;
  tradingDay: string | null;
}

/**
 * Per-run account context. Only the backtest loop that owns an instance mutates it.
 */
export class AccountManager {
  private state: MutableAccountState;

  constructor(initialCapital: number) {
    this.state = {
      initialCapital,
      equity: initialCapital,
      dailyLossAccumulated: 0,
      tradesTodayCount: 0,
      tradingDay: null,
    };
  }

  public getState(): AccountState {
    return Object.freeze({ ...this.state });
  }

  public get equity(): number {
    return this.state.equity;
  }

  /**
   * Rolls the trading day when the bar's date differs from the previous bar's.
   * Returns true when the daily counters were reset.
   */
  public beginBar(timestamp: number): boolean {
    const day = tradingDayOf(timestamp);
    if (day === this.state.tradingDay) return false;

    this.state.tradingDay = day;
    this.resetDailyStats();
    return true;
  }

  public updateOnTradeEnd(pnl: number): void {
    this.state.equity += pnl;
    if (pnl < 0) {
      this.state.dailyLossAccumulated += -pnl;
    }
    this.state.tradesTodayCount++;
  }

  public resetDailyStats(): void {
    this.state.dailyLossAccumulated = 0;
    this.state.tradesTodayCount = 0;
  }
}
