export type Direction = 'LONG' | 'SHORT';
export type VoteDirection = Direction | 'NEUTRAL';

export type StrategyName =
  | 'ema_crossover'
  | 'rsi_reversal'
  | 'macd_crossover'
  | 'bollinger_breakout';

export type TieBreakMethod = 'score' | 'priority' | 'adx_trend' | 'conservative' | 'momentum';

export type ExitReason = 'STOP_LOSS' | 'TAKE_PROFIT' | 'END_OF_DATA';

export interface Vote {
  readonly strategy: StrategyName;
  readonly direction: VoteDirection;
  readonly score: number; // 0-1, 0 for NEUTRAL
}

export interface Signal {
  readonly timestamp: number;
  readonly barIndex: number;
  readonly direction: Direction;
  readonly entryPrice: number;
  readonly stopLoss: number | null;
  readonly takeProfit: number | null;
  readonly votes: Readonly<Partial<Record<StrategyName, Vote>>>;
  readonly voteCount: number;
  readonly opposingVotes: number;
  readonly score: number;
  readonly tieBroken: boolean;
}

export interface Order {
  readonly direction: Direction;
  readonly entryPrice: number;
  readonly stopLoss: number;
  readonly takeProfit: number;
  readonly size: number;
  readonly riskAmount: number;
}

export interface AccountState {
  readonly initialCapital: number;
  readonly equity: number;
  readonly dailyLossAccumulated: number;
  readonly tradesTodayCount: number;
  readonly tradingDay: string | null; // YYYY-MM-DD (UTC)
}

export interface Trade {
  readonly id: number;
  readonly direction: Direction;
  readonly entryPrice: number;
  readonly exitPrice: number;
  readonly size: number;
  readonly pnl: number;
  readonly pnlPercent: number;
  readonly entryTime: number;
  readonly exitTime: number;
  readonly exitReason: ExitReason;
  readonly durationMinutes: number;
  readonly stopLoss: number;
  readonly takeProfit: number;
}

/** +1 for LONG, -1 for SHORT. */
export const directionSign = (direction: Direction): 1 | -1 => (direction === 'LONG' ? 1 : -1);

export const opposite = (direction: Direction): Direction => (direction === 'LONG' ? 'SHORT' : 'LONG');
