import { BarSource } from './BarSource';
import { Bar, Timeframe } from '../types/market';
import { logger } from '../utils/logger';

export interface MarketDataOptions {
  cacheTtlMs?: number;
  now?: () => number;
}

/**
 * Orders bars by time and keeps the last bar seen for each timestamp.
 */
export const normalizeBars = (bars: readonly Bar[]): Bar[] => {
  const byTimestamp = new Map<number, Bar>();
  for (const bar of bars) byTimestamp.set(bar.timestamp, bar);
  return [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
};

export class MarketDataEngine {
  private sources: Map<string, BarSource>;
  private readonly defaultSource: string;
  private cache: Map<string, { data: Bar[]; timestamp: number }>;
  private readonly cacheTtl: number;
  private readonly now: () => number;

  constructor(sources: BarSource[], options: MarketDataOptions = {}) {
    if (sources.length === 0) {
      throw new Error('MarketDataEngine needs at least one bar source');
    }
    this.sources = new Map(sources.map((s) => [s.name, s]));
    this.defaultSource = sources[0].name;
    this.cache = new Map();
    this.cacheTtl = options.cacheTtlMs ?? 60000;
    this.now = options.now ?? Date.now;
  }

  public async getBars(
    symbol: string,
    timeframe: Timeframe,
    limit: number = 500,
    sourceName: string = this.defaultSource,
  ): Promise<Bar[]> {
    const source = this.sources.get(sourceName);
    if (!source) {
      throw new Error(`Unknown bar source '${sourceName}'`);
    }

    const key = `${source.name}:${symbol}:${timeframe}:${limit}`;
    const cached = this.cache.get(key);
    const now = this.now();

    if (cached && now - cached.timestamp < this.cacheTtl) {
      logger.debug({ symbol, timeframe }, 'Returning cached market data');
      return [...cached.data];
    }

    try {
      const raw = await source.fetchBars(symbol, timeframe, limit);
      const data = normalizeBars(raw).slice(-limit);
      this.cache.set(key, { data, timestamp: now });
      return [...data];
    } catch (error) {
      logger.error({ error, symbol, timeframe, source: source.name }, 'Error fetching market data');
      throw error;
    }
  }

  public clearCache(): void {
    this.cache.clear();
  }
}
