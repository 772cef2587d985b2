import { Bar, Series } from '../types/market';
import { IndicatorFrame, IndicatorName } from '../analysis/indicators';

export const HOUR = 60 * 60 * 1000;
export const START = Date.UTC(2024, 0, 1);

/**
 * Doji bars one unit either side of the close, one hour apart.
 * True range stays at 2 as long as consecutive closes differ by at most 1.
 */
export const barsFromCloses = (closes: number[], start: number = START, step: number = HOUR): Bar[] =>
  closes.map((close, i) => ({
    timestamp: start + i * step,
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume: 1000,
  }));

export const bar = (overrides: Partial<Bar> = {}): Bar => ({
  timestamp: START,
  open: 100,
  high: 101,
  low: 99,
  close: 100,
  volume: 1000,
  ...overrides,
});

// 60 flat bars at 149, then +1 per bar from 150
export const trendingCloses = (length: number): number[] =>
  Array.from({ length }, (_, i) => (i < 60 ? 149 : 150 + (i - 60)));

/**
 * Frame of `length` undefined values per indicator, with the given series swapped in.
 */
export const frameWith = (length: number, series: Partial<Record<IndicatorName, Series>> = {}): IndicatorFrame => {
  const empty = (): Series => new Array<number | undefined>(length).fill(undefined);
  return {
    emaFast: series.emaFast ?? empty(),
    emaSlow: series.emaSlow ?? empty(),
    rsi: series.rsi ?? empty(),
    macd: series.macd ?? empty(),
    macdSignal: series.macdSignal ?? empty(),
    macdHist: series.macdHist ?? empty(),
    atr: series.atr ?? empty(),
    bbMiddle: series.bbMiddle ?? empty(),
    bbUpper: series.bbUpper ?? empty(),
    bbLower: series.bbLower ?? empty(),
    stochK: series.stochK ?? empty(),
    stochD: series.stochD ?? empty(),
    williamsR: series.williamsR ?? empty(),
    adx: series.adx ?? empty(),
    plusDi: series.plusDi ?? empty(),
    minusDi: series.minusDi ?? empty(),
    cci: series.cci ?? empty(),
    roc: series.roc ?? empty(),
    momentum: series.momentum ?? empty(),
  };
};
