import { Timeframe } from '../types/market';
import { AccountState } from '../types/trading';
import { EngineConfig } from '../config/EngineConfig';
import { computeIndicators } from '../analysis/indicators';
import { RiskDecision, RiskManager } from '../execution/RiskManager';
import { AccountManager } from '../core/AccountManager';
import { validateBars } from '../utils/BarValidator';
import { logger } from '../utils/logger';
import { MarketDataEngine } from './MarketDataEngine';
import { SignalEngine, SignalEvaluation } from './SignalEngine';

export interface LiveSignal {
  readonly symbol: string;
  readonly timeframe: Timeframe;
  readonly timestamp: number;
  readonly evaluation: SignalEvaluation;
  readonly decision: RiskDecision | null;
}

/**
 * Evaluates the most recent bar of a symbol: votes, signal and, when a signal exists,
 * the sizing decision for the given account.
 */
export class LiveSignalService {
  private readonly marketData: MarketDataEngine;
  private readonly config: EngineConfig;
  private readonly riskManager: RiskManager;
  private readonly barLimit: number;

  constructor(marketData: MarketDataEngine, config: EngineConfig, barLimit: number = 500) {
    this.marketData = marketData;
    this.config = config;
    this.riskManager = new RiskManager(config.risk);
    this.barLimit = barLimit;
  }

  public async evaluate(symbol: string, timeframe: Timeframe, account?: AccountState): Promise<LiveSignal> {
    const bars = await this.marketData.getBars(symbol, timeframe, this.barLimit);
    validateBars(bars, this.config.warmupBars);

    const frame = computeIndicators(bars, this.config.indicators);
    const evaluation = new SignalEngine(bars, frame, this.config).latest();
    const { signal } = evaluation;

    let decision: RiskDecision | null = null;
    if (signal) {
      const state = account ?? new AccountManager(this.config.risk.capital).getState();
      decision = this.riskManager.evaluate(
        { direction: signal.direction, entryPrice: signal.entryPrice },
        state,
        frame.atr[evaluation.index],
      );
    }

    logger.info(
      {
        symbol,
        timeframe,
        outcome: evaluation.outcome.kind,
        long: evaluation.longVotes,
        short: evaluation.shortVotes,
        decision: decision?.status ?? null,
      },
      'Live signal evaluated',
    );

    return Object.freeze({ symbol, timeframe, timestamp: evaluation.timestamp, evaluation, decision });
  }
}
