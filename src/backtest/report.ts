import { BacktestResult, PerformanceReport } from './types';

const pct = (value: number | null): string => (value === null ? 'n/a' : `${(value * 100).toFixed(2)}%`);
const num = (value: number | null, digits: number = 2): string => (value === null ? 'n/a' : value.toFixed(digits));
const money = (value: number): string => `$${value.toFixed(2)}`;

const day = (timestamp: number): string => new Date(timestamp).toISOString().slice(0, 10);

export const reportLines = (symbol: string, report: PerformanceReport): string[] => [
  '='.repeat(60),
  `BACKTEST RESULTS - ${symbol}`,
  '='.repeat(60),
  `   Initial Equity: ${money(report.initialEquity)}`,
  `   Final Equity: ${money(report.finalEquity)}`,
  `   Total PnL: ${money(report.totalPnl)} (${report.totalPnlPercent.toFixed(2)}%)`,
  `   CAGR: ${pct(report.cagr)}`,
  `   Sharpe Ratio: ${num(report.sharpe)}`,
  `   Sortino Ratio: ${num(report.sortino)}`,
  `   Max Drawdown: ${pct(report.maxDrawdown)} (${money(report.maxDrawdownAmount)})`,
  `   Win Rate: ${pct(report.winRate)}`,
  `   Profit Factor: ${num(report.profitFactor)}`,
  `   Total Trades: ${report.totalTrades} (W: ${report.winningTrades} L: ${report.losingTrades})`,
  `   Avg Win / Loss: ${money(report.avgWin)} / ${money(report.avgLoss)}`,
  `   Best / Worst: ${money(report.bestTrade)} / ${money(report.worstTrade)}`,
  `   Avg Duration: ${(report.avgDurationMinutes / 60).toFixed(1)}h`,
  '='.repeat(60),
];

export const formatBacktestResult = (result: BacktestResult): string =>
  [
    ...reportLines(result.symbol, result.report),
    `   Period: ${day(result.startDate)} -> ${day(result.endDate)} (${result.report.bars} bars)`,
    `   Signals: ${result.signals.length}  Orders: ${result.orders.length}  Rejected: ${result.rejections.length}`,
  ].join('\n');
