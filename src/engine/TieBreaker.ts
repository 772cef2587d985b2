import { Direction, StrategyName, TieBreakMethod, Vote } from '../types/trading';

// Highest first
export const STRATEGY_PRIORITY: readonly StrategyName[] = [
  'ema_crossover',
  'macd_crossover',
  'rsi_reversal',
  'bollinger_breakout',
];

const TREND_STRATEGIES: readonly StrategyName[] = ['ema_crossover', 'macd_crossover'];

export type TieBreaker =
  | { readonly method: 'score' }
  | { readonly method: 'priority'; readonly order: readonly StrategyName[] }
  | { readonly method: 'adx_trend'; readonly trendStrategies: readonly StrategyName[] }
  | { readonly method: 'conservative' }
  | { readonly method: 'momentum' };

export interface TieContext {
  readonly votes: readonly Vote[];
  readonly roc: number | undefined;
}

export const createTieBreaker = (method: TieBreakMethod): TieBreaker => {
  switch (method) {
    case 'score':
      return { method };
    case 'priority':
      return { method, order: STRATEGY_PRIORITY };
    case 'adx_trend':
      return { method, trendStrategies: TREND_STRATEGIES };
    case 'conservative':
      return { method };
    case 'momentum':
      return { method };
  }
};

const tally = (votes: readonly Vote[], direction: Direction): { count: number; weight: number } => {
  const matching = votes.filter((v) => v.direction === direction);
  return { count: matching.length, weight: matching.reduce((sum, v) => sum + Math.abs(v.score), 0) };
};

const byScore = (votes: readonly Vote[]): Direction | null => {
  const long = tally(votes, 'LONG');
  const short = tally(votes, 'SHORT');
  if (long.weight !== short.weight) return long.weight > short.weight ? 'LONG' : 'SHORT';
  if (long.count !== short.count) return long.count > short.count ? 'LONG' : 'SHORT';
  return null;
};

const byPriority = (votes: readonly Vote[], order: readonly StrategyName[]): Direction | null => {
  for (const strategy of order) {
    const vote = votes.find((v) => v.strategy === strategy);
    if (vote && vote.direction !== 'NEUTRAL') return vote.direction;
  }
  return null;
};

const byTrendAgreement = (votes: readonly Vote[], trendStrategies: readonly StrategyName[]): Direction | null => {
  const trendDirections = new Set<Direction>();
  for (const vote of votes) {
    if (trendStrategies.includes(vote.strategy) && vote.direction !== 'NEUTRAL') {
      trendDirections.add(vote.direction);
    }
  }
  if (trendDirections.size !== 1) return null;
  const [direction] = trendDirections;
  return direction;
};

const byMomentum = (roc: number | undefined): Direction | null => {
  if (roc === undefined || roc === 0 || !Number.isFinite(roc)) return null;
  return roc > 0 ? 'LONG' : 'SHORT';
};

/**
 * Decides a bar where both directions reached the vote threshold. Null means no signal.
 */
export const resolveTie = (tieBreaker: TieBreaker, context: TieContext): Direction | null => {
  switch (tieBreaker.method) {
    case 'score':
      return byScore(context.votes);
    case 'priority':
      return byPriority(context.votes, tieBreaker.order);
    case 'adx_trend':
      return byTrendAgreement(context.votes, tieBreaker.trendStrategies);
    case 'conservative':
      return null;
    case 'momentum':
      return byMomentum(context.roc);
  }
};
