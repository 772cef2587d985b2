import { BaseStrategy, NEUTRAL, StrategyContext, StrategyVerdict } from '../core/BaseStrategy';
import { VotingConfig } from '../config/EngineConfig';

/**
 * Mean reversion: RSI leaving an extreme zone, confirmed by the direction of Stochastic %K.
 */
export class RsiReversalStrategy extends BaseStrategy {
  constructor(config: VotingConfig) {
    super('rsi_reversal', config);
  }

  protected analyze({ frame, index }: StrategyContext): StrategyVerdict {
    const { rsiOversold, rsiOverbought } = this.config;

    if (this.crossedAboveLevel(frame.rsi, rsiOversold, index) && this.isRising(frame.stochK, index)) {
      return {
        direction: 'LONG',
        confirmations: [
          this.isBelow(frame.williamsR, index, -80),
          this.crossedAbove(frame.stochK, frame.stochD, index),
        ],
      };
    }

    if (this.crossedBelowLevel(frame.rsi, rsiOverbought, index) && this.isFalling(frame.stochK, index)) {
      return {
        direction: 'SHORT',
        confirmations: [
          this.isAbove(frame.williamsR, index, -20),
          this.crossedBelow(frame.stochK, frame.stochD, index),
        ],
      };
    }

    return NEUTRAL;
  }
}
