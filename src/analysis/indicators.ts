import { Bar, Series } from '../types/market';
import { IndicatorConfig } from '../config/EngineConfig';

/**
 * Every function here returns a series aligned 1:1 with its input.
 * Positions inside an indicator's warm-up window are `undefined`, never 0.
 */

export type IndicatorName =
  | 'emaFast'
  | 'emaSlow'
  | 'rsi'
  | 'macd'
  | 'macdSignal'
  | 'macdHist'
  | 'atr'
  | 'bbMiddle'
  | 'bbUpper'
  | 'bbLower'
  | 'stochK'
  | 'stochD'
  | 'williamsR'
  | 'adx'
  | 'plusDi'
  | 'minusDi'
  | 'cci'
  | 'roc'
  | 'momentum';

export type IndicatorFrame = Readonly<Record<IndicatorName, Series>>;

const emptySeries = (length: number): Series => new Array<number | undefined>(length).fill(undefined);

/**
 * Recursive smoothing seeded with the simple average of the first `period` defined values.
 * Leading undefined inputs are skipped, so smoothed series can be chained.
 */
const smooth = (values: Series, period: number, alpha: number): Series => {
  const out = emptySeries(values.length);
  let seedSum = 0;
  let seedCount = 0;
  let prev: number | undefined;

  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    if (value === undefined) {
      continue;
    }
    if (prev === undefined) {
      seedSum += value;
      seedCount++;
      if (seedCount === period) {
        prev = seedSum / period;
        out[i] = prev;
      }
      continue;
    }
    prev = prev + (value - prev) * alpha;
    out[i] = prev;
  }
  return out;
};

export const calculateSMA = (values: Series, period: number): Series => {
  const out = emptySeries(values.length);
  for (let i = period - 1; i < values.length; i++) {
    let sum = 0;
    let complete = true;
    for (let j = i - period + 1; j <= i; j++) {
      const value = values[j];
      if (value === undefined) {
        complete = false;
        break;
      }
      sum += value;
    }
    if (complete) out[i] = sum / period;
  }
  return out;
};

export const calculateEMA = (values: Series, period: number): Series => smooth(values, period, 2 / (period + 1));

/**
 * Wilder's smoothing (alpha = 1/period), used by RSI, ATR and ADX.
 */
export const wilderSmooth = (values: Series, period: number): Series => smooth(values, period, 1 / period);

const rsiFromAverages = (avgGain: number, avgLoss: number): number => {
  if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
};

/**
 * Relative Strength Index. First value at index `period` (needs `period` price changes).
 */
export const calculateRSI = (closes: number[], period: number = 14): Series => {
  const gains: Series = emptySeries(closes.length);
  const losses: Series = emptySeries(closes.length);
  for (let i = 1; i < closes.length; i++) {
    const change = closes[i] - closes[i - 1];
    gains[i] = change > 0 ? change : 0;
    losses[i] = change < 0 ? -change : 0;
  }

  const avgGains = wilderSmooth(gains, period);
  const avgLosses = wilderSmooth(losses, period);

  return avgGains.map((gain, i) => {
    const loss = avgLosses[i];
    return gain === undefined || loss === undefined ? undefined : rsiFromAverages(gain, loss);
  });
};

export const calculateTrueRange = (bars: readonly Bar[]): number[] =>
  bars.map((bar, i) => {
    if (i === 0) return bar.high - bar.low;
    const closePrev = bars[i - 1].close;
    return Math.max(bar.high - bar.low, Math.abs(bar.high - closePrev), Math.abs(bar.low - closePrev));
  });

/**
 * Average True Range: simple average of the first `period` true ranges, then Wilder's smoothing.
 */
export const calculateATR = (bars: readonly Bar[], period: number = 14): Series => wilderSmooth(calculateTrueRange(bars), period);

export interface MACDSeries {
  macd: Series;
  signal: Series;
  histogram: Series;
}

export const calculateMACD = (
  closes: number[],
  fastPeriod: number = 12,
  slowPeriod: number = 26,
  signalPeriod: number = 9,
): MACDSeries => {
  const fast = calculateEMA(closes, fastPeriod);
  const slow = calculateEMA(closes, slowPeriod);
  const macd = fast.map((f, i) => {
    const s = slow[i];
    return f === undefined || s === undefined ? undefined : f - s;
  });
  const signal = calculateEMA(macd, signalPeriod);
  const histogram = macd.map((m, i) => {
    const s = signal[i];
    return m === undefined || s === undefined ? undefined : m - s;
  });
  return { macd, signal, histogram };
};

export interface BollingerSeries {
  middle: Series;
  upper: Series;
  lower: Series;
}

/**
 * Bollinger Bands with population standard deviation.
 */
export const calculateBollinger = (closes: number[], period: number = 20, k: number = 2): BollingerSeries => {
  const middle = calculateSMA(closes, period);
  const upper = emptySeries(closes.length);
  const lower = emptySeries(closes.length);

  for (let i = period - 1; i < closes.length; i++) {
    const mean = middle[i];
    if (mean === undefined) continue;
    let variance = 0;
    for (let j = i - period + 1; j <= i; j++) {
      variance += (closes[j] - mean) ** 2;
    }
    const std = Math.sqrt(variance / period);
    upper[i] = mean + k * std;
    lower[i] = mean - k * std;
  }
  return { middle, upper, lower };
};

const windowExtremes = (bars: readonly Bar[], end: number, period: number): { highest: number; lowest: number } => {
  let highest = -Infinity;
  let lowest = Infinity;
  for (let j = end - period + 1; j <= end; j++) {
    highest = Math.max(highest, bars[j].high);
    lowest = Math.min(lowest, bars[j].low);
  }
  return { highest, lowest };
};

export interface StochasticSeries {
  k: Series;
  d: Series;
}

/**
 * Stochastic oscillator. %K = (close - lowest low) / (highest high - lowest low) * 100, %D = SMA(%K).
 * A flat window yields 50.
 */
export const calculateStochastic = (bars: readonly Bar[], kPeriod: number = 14, dPeriod: number = 3): StochasticSeries => {
  const k = emptySeries(bars.length);
  for (let i = kPeriod - 1; i < bars.length; i++) {
    const { highest, lowest } = windowExtremes(bars, i, kPeriod);
    const range = highest - lowest;
    k[i] = range === 0 ? 50 : ((bars[i].close - lowest) / range) * 100;
  }
  return { k, d: calculateSMA(k, dPeriod) };
};

/**
 * Williams %R in [-100, 0]. A flat window yields -50.
 */
export const calculateWilliamsR = (bars: readonly Bar[], period: number = 14): Series => {
  const out = emptySeries(bars.length);
  for (let i = period - 1; i < bars.length; i++) {
    const { highest, lowest } = windowExtremes(bars, i, period);
    const range = highest - lowest;
    out[i] = range === 0 ? -50 : ((highest - bars[i].close) / range) * -100;
  }
  return out;
};

export interface ADXSeries {
  adx: Series;
  plusDi: Series;
  minusDi: Series;
}

/**
 * Average Directional Index with +DI / -DI.
 * DI values start at index `period`, ADX at index `2 * period - 1`.
 */
export const calculateADX = (bars: readonly Bar[], period: number = 14): ADXSeries => {
  const plusDM = emptySeries(bars.length);
  const minusDM = emptySeries(bars.length);
  const tr = emptySeries(bars.length);
  const trueRange = calculateTrueRange(bars);

  for (let i = 1; i < bars.length; i++) {
    const upMove = bars[i].high - bars[i - 1].high;
    const downMove = bars[i - 1].low - bars[i].low;
    plusDM[i] = upMove > downMove && upMove > 0 ? upMove : 0;
    minusDM[i] = downMove > upMove && downMove > 0 ? downMove : 0;
    tr[i] = trueRange[i];
  }

  const smoothPlus = wilderSmooth(plusDM, period);
  const smoothMinus = wilderSmooth(minusDM, period);
  const smoothTR = wilderSmooth(tr, period);

  const plusDi = emptySeries(bars.length);
  const minusDi = emptySeries(bars.length);
  const dx = emptySeries(bars.length);

  for (let i = 0; i < bars.length; i++) {
    const p = smoothPlus[i];
    const m = smoothMinus[i];
    const t = smoothTR[i];
    if (p === undefined || m === undefined || t === undefined) continue;
    const pdi = t === 0 ? 0 : (p / t) * 100;
    const mdi = t === 0 ? 0 : (m / t) * 100;
    plusDi[i] = pdi;
    minusDi[i] = mdi;
    dx[i] = pdi + mdi === 0 ? 0 : (Math.abs(pdi - mdi) / (pdi + mdi)) * 100;
  }

  return { adx: wilderSmooth(dx, period), plusDi, minusDi };
};

/**
 * Commodity Channel Index over the typical price. Zero mean deviation yields 0.
 */
export const calculateCCI = (bars: readonly Bar[], period: number = 20): Series => {
  const typical = bars.map((b) => (b.high + b.low + b.close) / 3);
  const mean = calculateSMA(typical, period);
  const out = emptySeries(bars.length);

  for (let i = period - 1; i < bars.length; i++) {
    const m = mean[i];
    if (m === undefined) continue;
    let deviation = 0;
    for (let j = i - period + 1; j <= i; j++) {
      deviation += Math.abs(typical[j] - m);
    }
    const mad = deviation / period;
    out[i] = mad === 0 ? 0 : (typical[i] - m) / (0.015 * mad);
  }
  return out;
};

/**
 * Rate of change in percent over `period` bars.
 */
export const calculateROC = (closes: number[], period: number = 10): Series =>
  closes.map((close, i) => (i < period ? undefined : ((close - closes[i - period]) / closes[i - period]) * 100));

export const calculateMomentum = (closes: number[], period: number = 10): Series =>
  closes.map((close, i) => (i < period ? undefined : close - closes[i - period]));

export const computeIndicators = (bars: readonly Bar[], config: IndicatorConfig): IndicatorFrame => {
  const closes = bars.map((b) => b.close);
  const macd = calculateMACD(closes, config.emaFast, config.emaSlow, config.macdSignal);
  const bollinger = calculateBollinger(closes, config.bbPeriod, config.bbK);
  const stochastic = calculateStochastic(bars, config.stochK, config.stochD);
  const adx = calculateADX(bars, config.adxPeriod);

  return Object.freeze({
    emaFast: calculateEMA(closes, config.emaFast),
    emaSlow: calculateEMA(closes, config.emaSlow),
    rsi: calculateRSI(closes, config.rsiPeriod),
    macd: macd.macd,
    macdSignal: macd.signal,
    macdHist: macd.histogram,
    atr: calculateATR(bars, config.atrPeriod),
    bbMiddle: bollinger.middle,
    bbUpper: bollinger.upper,
    bbLower: bollinger.lower,
    stochK: stochastic.k,
    stochD: stochastic.d,
    williamsR: calculateWilliamsR(bars, config.williamsPeriod),
    adx: adx.adx,
    plusDi: adx.plusDi,
    minusDi: adx.minusDi,
    cci: calculateCCI(bars, config.cciPeriod),
    roc: calculateROC(closes, config.rocPeriod),
    momentum: calculateMomentum(closes, config.momentumPeriod),
  });
};
