import { Bar } from '../types/market';
import { Direction, Signal, StrategyName, TieBreakMethod, Vote, opposite } from '../types/trading';
import { IndicatorFrame, computeIndicators } from '../analysis/indicators';
import { BaseStrategy } from '../core/BaseStrategy';
import { DataError } from '../core/errors';
import { EngineConfig } from '../config/EngineConfig';
import { createStrategy } from '../strategies';
import { bracketLevels } from '../execution/RiskManager';
import { TieBreaker, createTieBreaker, resolveTie } from './TieBreaker';

export type VotingOutcome =
  | { readonly kind: 'WARMUP' }
  | { readonly kind: 'NO_CONSENSUS' }
  | { readonly kind: 'CONSENSUS'; readonly direction: Direction }
  | { readonly kind: 'TIE_RESOLVED'; readonly direction: Direction; readonly method: TieBreakMethod }
  | { readonly kind: 'TIE_UNRESOLVED'; readonly method: TieBreakMethod };

export interface SignalEvaluation {
  readonly index: number;
  readonly timestamp: number;
  readonly votes: readonly Vote[];
  readonly longVotes: number;
  readonly shortVotes: number;
  readonly outcome: VotingOutcome;
  readonly signal: Signal | null;
}

/**
 * Evaluates the enabled strategies bar by bar and combines their votes into signals.
 * Holds only immutable inputs, so one instance can be queried any number of times.
 */
export class SignalEngine {
  private readonly bars: readonly Bar[];
  private readonly frame: IndicatorFrame;
  private readonly config: EngineConfig;
  private readonly strategies: BaseStrategy[];
  private readonly tieBreaker: TieBreaker;

  constructor(bars: readonly Bar[], frame: IndicatorFrame, config: EngineConfig) {
    for (const [name, series] of Object.entries(frame)) {
      if (series.length !== bars.length) {
        throw new DataError(`Indicator '${name}' has ${series.length} values for ${bars.length} bars`);
      }
    }
    this.bars = bars;
    this.frame = frame;
    this.config = config;
    this.strategies = config.voting.enabledStrategies.map((name) => createStrategy(name, config.voting));
    this.tieBreaker = createTieBreaker(config.voting.tieBreakMethod);
  }

  public static fromBars(bars: readonly Bar[], config: EngineConfig): SignalEngine {
    return new SignalEngine(bars, computeIndicators(bars, config.indicators), config);
  }

  public get length(): number {
    return this.bars.length;
  }

  public isWarmingUp(index: number): boolean {
    return index + 1 < this.config.warmupBars;
  }

  /**
   * One vote per enabled strategy. All NEUTRAL inside the warm-up window.
   */
  public collectVotes(index: number): Vote[] {
    this.assertIndex(index);
    if (this.isWarmingUp(index)) {
      return this.strategies.map((s): Vote => ({ strategy: s.name, direction: 'NEUTRAL', score: 0 }));
    }
    const context = { bars: this.bars, frame: this.frame, index };
    return this.strategies.map((s) => s.vote(context));
  }

  public evaluate(index: number): SignalEvaluation {
    const votes = this.collectVotes(index);
    const longVotes = votes.filter((v) => v.direction === 'LONG').length;
    const shortVotes = votes.filter((v) => v.direction === 'SHORT').length;
    const outcome = this.decide(index, votes, longVotes, shortVotes);

    const direction =
      outcome.kind === 'CONSENSUS' || outcome.kind === 'TIE_RESOLVED' ? outcome.direction : null;

    return Object.freeze({
      index,
      timestamp: this.bars[index].timestamp,
      votes: Object.freeze(votes),
      longVotes,
      shortVotes,
      outcome,
      signal: direction === null ? null : this.buildSignal(index, direction, votes, outcome.kind === 'TIE_RESOLVED'),
    });
  }

  public latest(): SignalEvaluation {
    return this.evaluate(this.bars.length - 1);
  }

  public generateSignals(): Signal[] {
    const signals: Signal[] = [];
    for (let i = 0; i < this.bars.length; i++) {
      const { signal } = this.evaluate(i);
      if (signal) signals.push(signal);
    }
    return signals;
  }

  private decide(index: number, votes: Vote[], longVotes: number, shortVotes: number): VotingOutcome {
    if (this.isWarmingUp(index)) return { kind: 'WARMUP' };

    const min = this.config.voting.minStrategyVotes;
    const longQualifies = longVotes >= min;
    const shortQualifies = shortVotes >= min;

    if (longQualifies && !shortQualifies) return { kind: 'CONSENSUS', direction: 'LONG' };
    if (shortQualifies && !longQualifies) return { kind: 'CONSENSUS', direction: 'SHORT' };
    if (!longQualifies && !shortQualifies) return { kind: 'NO_CONSENSUS' };

    const method = this.tieBreaker.method;
    const resolved = resolveTie(this.tieBreaker, { votes, roc: this.frame.roc[index] });
    return resolved === null
      ? { kind: 'TIE_UNRESOLVED', method }
      : { kind: 'TIE_RESOLVED', direction: resolved, method };
  }

  private buildSignal(index: number, direction: Direction, votes: Vote[], tieBroken: boolean): Signal {
    const bar = this.bars[index];
    const agreeing = votes.filter((v) => v.direction === direction);
    const byStrategy: Partial<Record<StrategyName, Vote>> = {};
    for (const vote of votes) byStrategy[vote.strategy] = vote;

    const { atrSlMult, atrTpMult } = this.config.risk;
    const levels = bracketLevels(direction, bar.close, this.frame.atr[index], atrSlMult, atrTpMult);

    return Object.freeze({
      timestamp: bar.timestamp,
      barIndex: index,
      direction,
      entryPrice: bar.close,
      stopLoss: levels ? levels.stopLoss : null,
      takeProfit: levels ? levels.takeProfit : null,
      votes: Object.freeze(byStrategy),
      voteCount: agreeing.length,
      score: agreeing.length === 0 ? 0 : agreeing.reduce((sum, v) => sum + v.score, 0) / agreeing.length,
      tieBroken,
      opposingVotes: votes.filter((v) => v.direction === opposite(direction)).length,
    });
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.bars.length) {
      throw new RangeError(`Bar index ${index} outside 0..${this.bars.length - 1}`);
    }
  }
}
