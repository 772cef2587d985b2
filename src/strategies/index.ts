import { BaseStrategy } from '../core/BaseStrategy';
import { VotingConfig } from '../config/EngineConfig';
import { StrategyName } from '../types/trading';
import { EmaCrossoverStrategy } from './EmaCrossoverStrategy';
import { RsiReversalStrategy } from './RsiReversalStrategy';
import { MacdCrossoverStrategy } from './MacdCrossoverStrategy';
import { BollingerBreakoutStrategy } from './BollingerBreakoutStrategy';

const FACTORIES: Record<StrategyName, (config: VotingConfig) => BaseStrategy> = {
  ema_crossover: (config) => new EmaCrossoverStrategy(config),
  rsi_reversal: (config) => new RsiReversalStrategy(config),
  macd_crossover: (config) => new MacdCrossoverStrategy(config),
  bollinger_breakout: (config) => new BollingerBreakoutStrategy(config),
};

export const createStrategy = (name: StrategyName, config: VotingConfig): BaseStrategy => FACTORIES[name](config);

export { EmaCrossoverStrategy, RsiReversalStrategy, MacdCrossoverStrategy, BollingerBreakoutStrategy };
