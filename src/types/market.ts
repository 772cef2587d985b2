export type Timeframe = '1m' | '5m' | '15m' | '1h' | '1d';

export interface Bar {
  readonly timestamp: number; // epoch ms
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

export type Series = Array<number | undefined>;

export const TIMEFRAME_MINUTES: Readonly<Record<Timeframe, number>> = {
  '1m': 1,
  '5m': 5,
  '15m': 15,
  '1h': 60,
  '1d': 1440,
};
