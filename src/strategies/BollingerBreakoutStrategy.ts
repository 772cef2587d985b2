import { BaseStrategy, NEUTRAL, StrategyContext, StrategyVerdict } from '../core/BaseStrategy';
import { VotingConfig } from '../config/EngineConfig';

export class BollingerBreakoutStrategy extends BaseStrategy {
  constructor(config: VotingConfig) {
    super('bollinger_breakout', config);
  }

  protected analyze({ bars, frame, index }: StrategyContext): StrategyVerdict {
    const close = bars[index].close;
    const prevClose = bars[index - 1].close;
    const upper = frame.bbUpper[index];
    const lower = frame.bbLower[index];
    const prevUpper = frame.bbUpper[index - 1];
    const prevLower = frame.bbLower[index - 1];

    // Fresh break only: the previous close was still inside the band
    if (
      upper !== undefined &&
      prevUpper !== undefined &&
      prevClose <= prevUpper &&
      close > upper &&
      this.isAbove(frame.roc, index, 0)
    ) {
      return {
        direction: 'LONG',
        confirmations: [this.isGreater(frame.plusDi, frame.minusDi, index), this.isAbove(frame.adx, index, 25)],
      };
    }

    if (
      lower !== undefined &&
      prevLower !== undefined &&
      prevClose >= prevLower &&
      close < lower &&
      this.isBelow(frame.roc, index, 0)
    ) {
      return {
        direction: 'SHORT',
        confirmations: [this.isGreater(frame.minusDi, frame.plusDi, index), this.isAbove(frame.adx, index, 25)],
      };
    }

    return NEUTRAL;
  }
}
