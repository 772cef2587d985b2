import { Bar, Series } from '../types/market';
import { Direction, StrategyName, Vote } from '../types/trading';
import { IndicatorFrame } from '../analysis/indicators';
import { VotingConfig } from '../config/EngineConfig';

export interface StrategyContext {
  readonly bars: readonly Bar[];
  readonly frame: IndicatorFrame;
  readonly index: number;
}

/**
 * What a strategy saw at one bar. `confirmations` are secondary conditions that
 * raise the vote's score but never gate it.
 */
export type StrategyVerdict =
  | { direction: 'NEUTRAL' }
  | { direction: Direction; confirmations: boolean[] };

export const NEUTRAL: StrategyVerdict = { direction: 'NEUTRAL' };

export abstract class BaseStrategy {
  public readonly name: StrategyName;
  protected readonly config: VotingConfig;

  constructor(name: StrategyName, config: VotingConfig) {
    this.name = name;
    this.config = config;
  }

  protected abstract analyze(context: StrategyContext): StrategyVerdict;

  /**
   * Casts this strategy's vote at `context.index`, using only data up to that index.
   */
  public vote(context: StrategyContext): Vote {
    if (context.index < 1 || context.index >= context.bars.length) {
      return { strategy: this.name, direction: 'NEUTRAL', score: 0 };
    }

    const verdict = this.analyze(context);
    if (verdict.direction === 'NEUTRAL') {
      return { strategy: this.name, direction: 'NEUTRAL', score: 0 };
    }

    // The trigger itself counts as one satisfied condition
    const satisfied = 1 + verdict.confirmations.filter(Boolean).length;
    return {
      strategy: this.name,
      direction: verdict.direction,
      score: satisfied / (1 + verdict.confirmations.length),
    };
  }

  // Utility: `a` moved from <= b to > b between i-1 and i
  protected crossedAbove(a: Series, b: Series, i: number): boolean {
    const prevA = a[i - 1];
    const prevB = b[i - 1];
    const curA = a[i];
    const curB = b[i];
    if (prevA === undefined || prevB === undefined || curA === undefined || curB === undefined) return false;
    return prevA <= prevB && curA > curB;
  }

  protected crossedBelow(a: Series, b: Series, i: number): boolean {
    const prevA = a[i - 1];
    const prevB = b[i - 1];
    const curA = a[i];
    const curB = b[i];
    if (prevA === undefined || prevB === undefined || curA === undefined || curB === undefined) return false;
    return prevA >= prevB && curA < curB;
  }

  protected crossedAboveLevel(series: Series, level: number, i: number): boolean {
    const prev = series[i - 1];
    const cur = series[i];
    return prev !== undefined && cur !== undefined && prev <= level && cur > level;
  }

  protected crossedBelowLevel(series: Series, level: number, i: number): boolean {
    const prev = series[i - 1];
    const cur = series[i];
    return prev !== undefined && cur !== undefined && prev >= level && cur < level;
  }

  protected isRising(series: Series, i: number): boolean {
    const prev = series[i - 1];
    const cur = series[i];
    return prev !== undefined && cur !== undefined && cur > prev;
  }

  protected isFalling(series: Series, i: number): boolean {
    const prev = series[i - 1];
    const cur = series[i];
    return prev !== undefined && cur !== undefined && cur < prev;
  }

  // Utility: undefined compares as false
  protected isAbove(series: Series, i: number, threshold: number): boolean {
    const value = series[i];
    return value !== undefined && value > threshold;
  }

  protected isBelow(series: Series, i: number, threshold: number): boolean {
    const value = series[i];
    return value !== undefined && value < threshold;
  }

  protected isGreater(a: Series, b: Series, i: number): boolean {
    const left = a[i];
    const right = b[i];
    return left !== undefined && right !== undefined && left > right;
  }

  protected isAtLeast(a: Series, b: Series, i: number): boolean {
    const left = a[i];
    const right = b[i];
    return left !== undefined && right !== undefined && left >= right;
  }
}
