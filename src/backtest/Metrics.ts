import { Trade } from '../types/trading';
import { DrawdownPoint, EquityPoint, PerformanceReport } from './types';

export interface MetricsOptions {
  initialCapital: number;
  periodsPerYear: number;
}

const mean = (values: readonly number[]): number => values.reduce((a, b) => a + b, 0) / values.length;

// Population standard deviation
const stdDev = (values: readonly number[]): number => {
  const avg = mean(values);
  return Math.sqrt(values.reduce((acc, v) => acc + Math.pow(v - avg, 2), 0) / values.length);
};

const finiteOrNull = (value: number): number | null => (Number.isFinite(value) ? value : null);

export class MetricsCalculator {
  public static calculate(
    equityCurve: readonly EquityPoint[],
    trades: readonly Trade[],
    options: MetricsOptions,
  ): PerformanceReport {
    const equity = equityCurve.map((p) => p.equity);
    const returns = this.periodReturns(equity);
    const drawdowns = this.drawdownSeries(equityCurve);

    const wins = trades.filter((t) => t.pnl > 0);
    const losses = trades.filter((t) => t.pnl < 0);
    const grossProfit = wins.reduce((sum, t) => sum + t.pnl, 0);
    const grossLoss = losses.reduce((sum, t) => sum + t.pnl, 0);
    const totalPnl = trades.reduce((sum, t) => sum + t.pnl, 0);
    const finalEquity = equity.length > 0 ? equity[equity.length - 1] : options.initialCapital;

    return Object.freeze({
      bars: equityCurve.length,
      cagr: this.cagr(equity, options.periodsPerYear),
      sharpe: this.sharpeRatio(returns, options.periodsPerYear),
      sortino: this.sortinoRatio(returns, options.periodsPerYear),
      maxDrawdown: this.maxDrawdown(equity),
      maxDrawdownAmount: drawdowns.reduce((min, d) => Math.min(min, d.drawdown), 0),
      winRate: this.winRate(trades),
      profitFactor: this.profitFactor(trades),
      totalTrades: trades.length,
      winningTrades: wins.length,
      losingTrades: losses.length,
      grossProfit,
      grossLoss,
      totalPnl,
      totalPnlPercent: options.initialCapital > 0 ? (totalPnl / options.initialCapital) * 100 : 0,
      avgPnl: trades.length > 0 ? totalPnl / trades.length : 0,
      avgWin: wins.length > 0 ? grossProfit / wins.length : 0,
      avgLoss: losses.length > 0 ? grossLoss / losses.length : 0,
      bestTrade: trades.length > 0 ? Math.max(...trades.map((t) => t.pnl)) : 0,
      worstTrade: trades.length > 0 ? Math.min(...trades.map((t) => t.pnl)) : 0,
      avgDurationMinutes: trades.length > 0 ? mean(trades.map((t) => t.durationMinutes)) : 0,
      initialEquity: options.initialCapital,
      finalEquity,
      drawdowns: Object.freeze(drawdowns),
    });
  }

  public static periodReturns(equity: readonly number[]): number[] {
    const returns: number[] = [];
    for (let i = 1; i < equity.length; i++) {
      returns.push(equity[i - 1] === 0 ? 0 : equity[i] / equity[i - 1] - 1);
    }
    return returns;
  }

  /**
   * (end / start) ^ (periodsPerYear / points) - 1. Null when there is nothing to annualize.
   */
  public static cagr(equity: readonly number[], periodsPerYear: number): number | null {
    if (equity.length === 0) return null;
    const start = equity[0];
    const end = equity[equity.length - 1];
    if (start <= 0 || end < 0) return null;
    return finiteOrNull(Math.pow(end / start, periodsPerYear / equity.length) - 1);
  }

  public static sharpeRatio(returns: readonly number[], periodsPerYear: number): number | null {
    if (returns.length < 2) return null;
    const sd = stdDev(returns);
    if (sd === 0) return null;
    return finiteOrNull((mean(returns) / sd) * Math.sqrt(periodsPerYear));
  }

  // Downside deviation is the spread of the negative returns only
  public static sortinoRatio(returns: readonly number[], periodsPerYear: number): number | null {
    if (returns.length < 2) return null;
    const negative = returns.filter((r) => r < 0);
    if (negative.length === 0) return null;
    const downside = stdDev(negative);
    if (downside === 0) return null;
    return finiteOrNull((mean(returns) / downside) * Math.sqrt(periodsPerYear));
  }

  /**
   * Most negative equity / running peak - 1, as a fraction (<= 0).
   */
  public static maxDrawdown(equity: readonly number[]): number {
    let peak = -Infinity;
    let worst = 0;
    for (const value of equity) {
      if (value > peak) peak = value;
      if (peak > 0) {
        const dd = value / peak - 1;
        if (dd < worst) worst = dd;
      }
    }
    return worst;
  }

  public static drawdownSeries(equityCurve: readonly EquityPoint[]): DrawdownPoint[] {
    let peak = -Infinity;
    return equityCurve.map((point) => {
      if (point.equity > peak) peak = point.equity;
      return Object.freeze({
        timestamp: point.timestamp,
        drawdown: point.equity - peak,
        drawdownPct: peak > 0 ? point.equity / peak - 1 : 0,
      });
    });
  }

  public static winRate(trades: readonly Trade[]): number {
    if (trades.length === 0) return 0;
    return trades.filter((t) => t.pnl > 0).length / trades.length;
  }

  public static profitFactor(trades: readonly Trade[]): number | null {
    const grossProfit = trades.filter((t) => t.pnl > 0).reduce((sum, t) => sum + t.pnl, 0);
    const grossLoss = Math.abs(trades.filter((t) => t.pnl < 0).reduce((sum, t) => sum + t.pnl, 0));
    if (grossLoss === 0) return null;
    return grossProfit / grossLoss;
  }
}
