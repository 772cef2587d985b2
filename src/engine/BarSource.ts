import { Bar, Timeframe } from '../types/market';

export interface BarSource {
  name: string;
  fetchBars(symbol: string, timeframe: Timeframe, limit?: number): Promise<Bar[]>;
}
