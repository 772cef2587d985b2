import { Bar } from '../types/market';
import { ExitReason, Order, Signal } from '../types/trading';
import { EngineConfig, EngineConfigInput, parseEngineConfig } from '../config/EngineConfig';
import { computeIndicators } from '../analysis/indicators';
import { SignalEngine } from '../engine/SignalEngine';
import { RiskManager } from '../execution/RiskManager';
import { AccountManager } from '../core/AccountManager';
import { validateBars } from '../utils/BarValidator';
import { logger } from '../utils/logger';
import { Portfolio } from './Portfolio';
import { TradeSimulator } from './TradeSimulator';
import { MetricsCalculator } from './Metrics';
import { BacktestResult, RiskRejection } from './types';

/**
 * Everything one run mutates. Created per call so runs never share state.
 */
interface RunContext {
  account: AccountManager;
  portfolio: Portfolio;
  signals: Signal[];
  orders: Order[];
  rejections: RiskRejection[];
}

export class BacktestEngine {
  public readonly config: EngineConfig;
  private readonly riskManager: RiskManager;
  private readonly simulator: TradeSimulator;

  constructor(config: EngineConfigInput = {}) {
    this.config = parseEngineConfig(config);
    this.riskManager = new RiskManager(this.config.risk);
    this.simulator = new TradeSimulator(this.config.execution);
  }

  /**
   * Run the bar-by-bar simulation over historical bars
   */
  public runBacktest(bars: readonly Bar[], symbol: string = 'UNKNOWN'): BacktestResult {
    validateBars(bars, this.config.warmupBars);

    const frame = computeIndicators(bars, this.config.indicators);
    const signalEngine = new SignalEngine(bars, frame, this.config);
    const ctx: RunContext = {
      account: new AccountManager(this.config.risk.capital),
      portfolio: new Portfolio(),
      signals: [],
      orders: [],
      rejections: [],
    };

    logger.info({ symbol, bars: bars.length, strategies: this.config.voting.enabledStrategies }, 'Backtest started');

    for (let i = 0; i < bars.length; i++) {
      const bar = bars[i];
      ctx.account.beginBar(bar.timestamp);

      this.checkExit(ctx, bar);

      if (ctx.portfolio.position.status === 'FLAT') {
        const { signal } = signalEngine.evaluate(i);
        if (signal) this.handleSignal(ctx, signal, frame.atr[i]);
      }

      ctx.portfolio.recordEquity(bar.timestamp, ctx.account.equity + ctx.portfolio.unrealizedPnl(bar.close));
    }

    const lastBar = bars[bars.length - 1];
    if (ctx.portfolio.position.status === 'OPEN') {
      // Last curve point already marks this position at the same close
      this.closePosition(ctx, lastBar.close, lastBar.timestamp, 'END_OF_DATA');
    }

    const trades = ctx.portfolio.tradeHistory;
    const report = MetricsCalculator.calculate(ctx.portfolio.equityCurve, trades, {
      initialCapital: this.config.risk.capital,
      periodsPerYear: this.config.periodsPerYear,
    });

    logger.info(
      {
        symbol,
        trades: report.totalTrades,
        finalEquity: report.finalEquity,
        maxDrawdown: report.maxDrawdown,
        rejections: ctx.rejections.length,
      },
      'Backtest finished',
    );

    return Object.freeze({
      symbol,
      startDate: bars[0].timestamp,
      endDate: lastBar.timestamp,
      config: this.config,
      trades: Object.freeze([...trades]),
      positions: Object.freeze([...ctx.portfolio.closedPositions]),
      equityCurve: Object.freeze([...ctx.portfolio.equityCurve]),
      signals: Object.freeze(ctx.signals),
      orders: Object.freeze(ctx.orders),
      rejections: Object.freeze(ctx.rejections),
      finalAccount: ctx.account.getState(),
      report,
    });
  }

  private checkExit(ctx: RunContext, bar: Bar): void {
    const position = ctx.portfolio.position;
    if (position.status !== 'OPEN') return;

    const exit = this.simulator.checkExit(position, bar);
    if (exit) {
      this.closePosition(ctx, exit.price, bar.timestamp, exit.reason);
    }
  }

  private handleSignal(ctx: RunContext, signal: Signal, atr: number | undefined): void {
    ctx.signals.push(signal);

    const decision = this.riskManager.evaluate(
      { direction: signal.direction, entryPrice: signal.entryPrice },
      ctx.account.getState(),
      atr,
    );

    if (decision.status === 'REJECTED') {
      ctx.rejections.push(
        Object.freeze({
          timestamp: signal.timestamp,
          barIndex: signal.barIndex,
          direction: signal.direction,
          reason: decision.reason,
          detail: decision.detail,
        }),
      );
      logger.debug({ barIndex: signal.barIndex, reason: decision.reason, detail: decision.detail }, 'Signal rejected');
      return;
    }

    const { order } = decision;
    ctx.orders.push(order);
    const fill = this.simulator.entryFill(order.entryPrice, order.direction);
    const position = ctx.portfolio.openPosition(order, fill, signal.timestamp);
    logger.debug(
      {
        id: position.id,
        direction: order.direction,
        fill,
        size: order.size,
        stopLoss: order.stopLoss,
        takeProfit: order.takeProfit,
      },
      'Position opened',
    );
  }

  private closePosition(ctx: RunContext, exitPrice: number, exitTime: number, reason: ExitReason): void {
    const { trade } = ctx.portfolio.closePosition(exitPrice, exitTime, reason);
    ctx.account.updateOnTradeEnd(trade.pnl);
    logger.debug({ id: trade.id, reason, exitPrice, pnl: trade.pnl }, 'Position closed');
  }
}
