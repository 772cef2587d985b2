import { BaseStrategy, NEUTRAL, StrategyContext, StrategyVerdict } from '../core/BaseStrategy';
import { VotingConfig } from '../config/EngineConfig';

/**
 * MACD / signal-line cross, gated on ADX trend strength.
 */
export class MacdCrossoverStrategy extends BaseStrategy {
  constructor(config: VotingConfig) {
    super('macd_crossover', config);
  }

  protected analyze({ frame, index }: StrategyContext): StrategyVerdict {
    const trending = this.isAbove(frame.adx, index, this.config.macdAdxMin);
    if (!trending) return NEUTRAL;

    if (this.crossedAbove(frame.macd, frame.macdSignal, index)) {
      return {
        direction: 'LONG',
        confirmations: [
          this.isRising(frame.macdHist, index),
          this.isAbove(frame.cci, index, 0),
          this.isAbove(frame.momentum, index, 0),
        ],
      };
    }

    if (this.crossedBelow(frame.macd, frame.macdSignal, index)) {
      return {
        direction: 'SHORT',
        confirmations: [
          this.isFalling(frame.macdHist, index),
          this.isBelow(frame.cci, index, 0),
          this.isBelow(frame.momentum, index, 0),
        ],
      };
    }

    return NEUTRAL;
  }
}
