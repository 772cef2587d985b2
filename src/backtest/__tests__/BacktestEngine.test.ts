import { BacktestEngine } from '../BacktestEngine';
import { EngineConfigInput } from '../../config/EngineConfig';
import { ConfigError, DataError } from '../../core/errors';
import { HOUR, START, barsFromCloses, trendingCloses } from '../../__fixtures__/builders';

// EMA(3)/EMA(8) only, one vote is enough
const EMA_ONLY: EngineConfigInput = {
  indicators: { emaFast: 3, emaSlow: 8 },
  voting: { enabledStrategies: ['ema_crossover'], minStrategyVotes: 1 },
  risk: { capital: 10000, riskPerTrade: 0.0075, atrSlMult: 1.5, atrTpMult: 2 },
  warmupBars: 30,
};

const withRisk = (risk: EngineConfigInput['risk']): EngineConfigInput => ({
  ...EMA_ONLY,
  risk: { ...EMA_ONLY.risk, ...risk },
});

// Cross up at bar 60, then a drop to the stop at bar 62 that also crosses down
const reversalBars = () => barsFromCloses([...new Array<number>(60).fill(149), 150, 149, 148]);

describe('BacktestEngine', () => {
  describe('trend run', () => {
    const bars = barsFromCloses(trendingCloses(250));
    const result = new BacktestEngine(EMA_ONLY).runBacktest(bars, 'TEST');

    it('should open one LONG sized from ATR and exit at the target', () => {
      expect(result.orders).toEqual([
        { direction: 'LONG', entryPrice: 150, stopLoss: 147, takeProfit: 154, size: 25, riskAmount: 75 },
      ]);
      expect(result.trades).toEqual([
        {
          id: 1,
          direction: 'LONG',
          entryPrice: 150,
          exitPrice: 154,
          size: 25,
          pnl: 100,
          pnlPercent: (100 / 3750) * 100,
          entryTime: START + 60 * HOUR,
          exitTime: START + 63 * HOUR,
          exitReason: 'TAKE_PROFIT',
          durationMinutes: 180,
          stopLoss: 147,
          takeProfit: 154,
        },
      ]);
    });

    it('should mark open positions to market on the equity curve', () => {
      expect(result.equityCurve).toHaveLength(250);
      expect(result.equityCurve.slice(59, 66).map((p) => p.equity)).toEqual([
        10000, 10000, 10025, 10050, 10100, 10100, 10100,
      ]);
      expect(result.equityCurve[249]).toEqual({ timestamp: START + 249 * HOUR, equity: 10100 });
    });

    it('should report the run', () => {
      expect(result.symbol).toBe('TEST');
      expect(result.startDate).toBe(START);
      expect(result.endDate).toBe(START + 249 * HOUR);
      expect(result.signals).toHaveLength(1);
      expect(result.rejections).toEqual([]);
      expect(result.finalAccount.equity).toBe(10100);
      expect(result.report).toMatchObject({
        totalTrades: 1,
        winRate: 1,
        profitFactor: null,
        maxDrawdown: 0,
        finalEquity: 10100,
        totalPnl: 100,
      });
      expect(Object.isFrozen(result)).toBe(true);
    });

    it('should hand out a frozen config that later runs cannot be changed through', () => {
      const engine = new BacktestEngine(EMA_ONLY);
      const first = engine.runBacktest(bars, 'TEST');
      expect(Object.isFrozen(first.config)).toBe(true);
      expect(Object.isFrozen(first.config.risk)).toBe(true);
      expect(Reflect.set(first.config.risk, 'riskPerTrade', 0.03)).toBe(false);
      expect(engine.runBacktest(bars, 'TEST').orders[0].size).toBe(25);
    });

    it('should produce identical output when run again', () => {
      const engine = new BacktestEngine(EMA_ONLY);
      expect(engine.runBacktest(bars, 'TEST')).toEqual(engine.runBacktest(bars, 'TEST'));
    });
  });

  it('should charge spread on entry and slippage on exit', () => {
    const bars = barsFromCloses(trendingCloses(250));
    const result = new BacktestEngine({ ...EMA_ONLY, execution: { simulateSpread: 0.5, simulateSlippage: 0.25 } }).runBacktest(bars);
    expect(result.trades[0]).toMatchObject({ entryPrice: 150.5, exitPrice: 153.75, pnl: 81.25 });
    expect(result.equityCurve[60].equity).toBe(9987.5);
    expect(result.symbol).toBe('UNKNOWN');
  });

  describe('reversal run', () => {
    it('should stop out, reverse SHORT and close it at the end of data', () => {
      const result = new BacktestEngine(EMA_ONLY).runBacktest(reversalBars());
      expect(result.trades.map((t) => [t.direction, t.exitReason, t.exitPrice, t.pnl])).toEqual([
        ['LONG', 'STOP_LOSS', 147, -75],
        ['SHORT', 'END_OF_DATA', 148, 0],
      ]);
      expect(result.orders[1]).toEqual({
        direction: 'SHORT',
        entryPrice: 148,
        stopLoss: 151,
        takeProfit: 144,
        size: 24,
        riskAmount: 74.4375,
      });
      expect(result.finalAccount).toMatchObject({ equity: 9925, dailyLossAccumulated: 75, tradesTodayCount: 2 });
      expect(result.report.maxDrawdown).toBeCloseTo(-0.0075, 10);
    });

    it('should reject new trades after the daily trade limit', () => {
      const result = new BacktestEngine(withRisk({ maxTradesPerDay: 1 })).runBacktest(reversalBars());
      expect(result.trades).toHaveLength(1);
      expect(result.rejections).toEqual([
        {
          timestamp: START + 62 * HOUR,
          barIndex: 62,
          direction: 'SHORT',
          reason: 'MAX_TRADES',
          detail: 'Max trades per day reached (1)',
        },
      ]);
    });

    it('should reject new trades after the daily loss limit', () => {
      const result = new BacktestEngine(withRisk({ dailyLossLimit: 0.005 })).runBacktest(reversalBars());
      expect(result.rejections.map((r) => r.reason)).toEqual(['DAILY_LOSS_LIMIT']);
      expect(result.finalAccount.equity).toBe(9925);
    });
  });

  describe('trading day', () => {
    // Stop-out at bar 62, then a cross back up at bar 64
    const recovery = [...new Array<number>(60).fill(149), 150, 149, 148, 149, 150, 151, 152, 153];
    const config = withRisk({ maxTradesPerDay: 1 });

    it('should keep the trade count within the same UTC day', () => {
      const result = new BacktestEngine(config).runBacktest(barsFromCloses(recovery));
      expect(result.trades).toHaveLength(1);
      expect(result.rejections.map((r) => [r.barIndex, r.reason])).toEqual([
        [62, 'MAX_TRADES'],
        [64, 'MAX_TRADES'],
      ]);
    });

    it('should reset daily counters on a new UTC day', () => {
      const bars = barsFromCloses(recovery).map((b, i) => (i >= 63 ? { ...b, timestamp: b.timestamp + 24 * HOUR } : b));
      const result = new BacktestEngine(config).runBacktest(bars);
      expect(result.rejections.map((r) => r.barIndex)).toEqual([62]);
      expect(result.trades[1]).toMatchObject({
        direction: 'LONG',
        entryPrice: 150,
        exitReason: 'TAKE_PROFIT',
        entryTime: START + 88 * HOUR,
        size: 24,
        pnl: 96,
      });
      expect(result.finalAccount).toMatchObject({ tradesTodayCount: 1, tradingDay: '2024-01-04' });
    });
  });

  it('should raise DataError before simulating bad input', () => {
    const engine = new BacktestEngine(EMA_ONLY);
    expect(() => engine.runBacktest(barsFromCloses([100, 101, 102]))).toThrow(DataError);

    const broken = barsFromCloses(trendingCloses(80)).map((b, i) => (i === 10 ? { ...b, high: b.low - 1 } : b));
    expect(() => engine.runBacktest(broken)).toThrow(DataError);
  });

  it('should raise ConfigError on invalid configuration', () => {
    expect(() => new BacktestEngine({ indicators: { rsiPeriod: 0 } })).toThrow(ConfigError);
    expect(() => new BacktestEngine({ voting: { enabledStrategies: ['ema_crossover'], minStrategyVotes: 2 } })).toThrow(ConfigError);
  });
});
