import { BaseStrategy, NEUTRAL, StrategyContext, StrategyVerdict } from '../core/BaseStrategy';
import { VotingConfig } from '../config/EngineConfig';

export class EmaCrossoverStrategy extends BaseStrategy {
  constructor(config: VotingConfig) {
    super('ema_crossover', config);
  }

  protected analyze({ frame, index }: StrategyContext): StrategyVerdict {
    if (this.crossedAbove(frame.emaFast, frame.emaSlow, index)) {
      return {
        direction: 'LONG',
        confirmations: [
          this.isAtLeast(frame.macd, frame.macdSignal, index),
          this.isAbove(frame.rsi, index, 50),
        ],
      };
    }

    if (this.crossedBelow(frame.emaFast, frame.emaSlow, index)) {
      return {
        direction: 'SHORT',
        confirmations: [
          this.isAtLeast(frame.macdSignal, frame.macd, index),
          this.isBelow(frame.rsi, index, 50),
        ],
      };
    }

    return NEUTRAL;
  }
}
