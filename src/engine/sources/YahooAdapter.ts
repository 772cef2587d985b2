import { z } from 'zod';
import { BarSource } from '../BarSource';
import { Bar, TIMEFRAME_MINUTES, Timeframe } from '../../types/market';
import { DataError } from '../../core/errors';
import { YahooApiClient } from '../../client/YahooApiClient';
import { logger } from '../../utils/logger';

const FX_MAJORS = ['EURUSD', 'GBPUSD', 'USDJPY', 'AUDUSD'];

// Furthest the chart API serves each interval back from today
const MAX_HISTORY_DAYS: Readonly<Record<Timeframe, number>> = {
  '1m': 7,
  '5m': 60,
  '15m': 60,
  '1h': 730,
  '1d': 3650,
};

const DAY_MS = 24 * 60 * 60 * 1000;

const nullableSeries = z.array(z.number().nullable());

const quoteSchema = z.object({
  open: nullableSeries.default([]),
  high: nullableSeries.default([]),
  low: nullableSeries.default([]),
  close: nullableSeries.default([]),
  volume: nullableSeries.default([]),
});

type ChartQuote = z.infer<typeof quoteSchema>;

const chartSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).default([]),
          indicators: z.object({
            quote: z.array(quoteSchema).min(1),
          }),
        }),
      )
      .nullable(),
    error: z.object({ code: z.string(), description: z.string() }).nullable().optional(),
  }),
});

/**
 * FX majors are quoted as `EURUSD=X`; anything else passes through unchanged.
 */
export const normalizeSymbol = (symbol: string): string => {
  const compact = symbol.replace(/\./g, '').toUpperCase();
  if (FX_MAJORS.includes(compact)) return `${compact}=X`;
  return symbol;
};

/**
 * Days of history needed for `limit` bars, capped at what the interval allows.
 */
export const historyDays = (timeframe: Timeframe, limit: number): number => {
  const needed = Math.ceil((limit * TIMEFRAME_MINUTES[timeframe]) / (24 * 60));
  return Math.min(Math.max(needed, 1), MAX_HISTORY_DAYS[timeframe]);
};

export class YahooAdapter implements BarSource {
  public name = 'Yahoo';
  private client: YahooApiClient;
  private readonly now: () => number;

  constructor(client: YahooApiClient = new YahooApiClient(), now: () => number = Date.now) {
    this.client = client;
    this.now = now;
  }

  public async fetchBars(symbol: string, timeframe: Timeframe, limit: number = 500): Promise<Bar[]> {
    const yahooSymbol = normalizeSymbol(symbol);
    const end = this.now();
    const start = end - historyDays(timeframe, limit) * DAY_MS;

    const raw = await this.client.get(`/v8/finance/chart/${encodeURIComponent(yahooSymbol)}`, {
      interval: timeframe,
      period1: Math.floor(start / 1000),
      period2: Math.floor(end / 1000),
    });

    const parsed = chartSchema.safeParse(raw);
    if (!parsed.success) {
      logger.error({ symbol: yahooSymbol, issues: parsed.error.issues.length }, 'Unexpected chart response');
      throw new DataError(`Unexpected chart response for ${yahooSymbol}`);
    }

    const { result, error } = parsed.data.chart;
    if (error) {
      throw new DataError(`Chart API error for ${yahooSymbol}: ${error.code} ${error.description}`);
    }
    if (!result || result.length === 0) {
      throw new DataError(`No data returned for ${yahooSymbol} at ${timeframe}`);
    }

    const { timestamp, indicators } = result[0];
    const bars = this.toBars(timestamp, indicators.quote[0]);
    if (bars.length === 0) {
      throw new DataError(`No complete bars returned for ${yahooSymbol} at ${timeframe}`);
    }

    return bars.sort((a, b) => a.timestamp - b.timestamp).slice(-limit);
  }

  // Rows with any missing price are skipped; FX quotes carry no volume
  private toBars(timestamps: number[], quote: ChartQuote): Bar[] {
    const bars: Bar[] = [];
    timestamps.forEach((ts, i) => {
      const open = quote.open[i];
      const high = quote.high[i];
      const low = quote.low[i];
      const close = quote.close[i];
      if (open == null || high == null || low == null || close == null) return;
      bars.push({ timestamp: ts * 1000, open, high, low, close, volume: quote.volume[i] ?? 0 });
    });
    return bars;
  }
}
