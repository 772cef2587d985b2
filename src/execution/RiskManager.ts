import { AccountState, Direction, Order, directionSign } from '../types/trading';
import { RiskConfig } from '../config/EngineConfig';

export type RejectionReason =
  | 'MAX_TRADES'
  | 'DAILY_LOSS_LIMIT'
  | 'INVALID_STOP_DISTANCE'
  | 'INSUFFICIENT_RISK_BUDGET';

export type RiskDecision =
  | { readonly status: 'ACCEPTED'; readonly order: Order }
  | { readonly status: 'REJECTED'; readonly reason: RejectionReason; readonly detail: string };

export interface OrderRequest {
  readonly direction: Direction;
  readonly entryPrice: number;
}

export interface BracketLevels {
  stopLoss: number;
  takeProfit: number;
  stopDistance: number;
}

/**
 * ATR-scaled stop-loss / take-profit around an entry. Null when ATR is missing or not positive.
 */
export const bracketLevels = (
  direction: Direction,
  entryPrice: number,
  atr: number | undefined,
  atrSlMult: number,
  atrTpMult: number,
): BracketLevels | null => {
  if (atr === undefined || !Number.isFinite(atr)) return null;
  const stopDistance = atr * atrSlMult;
  if (stopDistance <= 0) return null;
  const sign = directionSign(direction);
  return {
    stopLoss: entryPrice - sign * stopDistance,
    takeProfit: entryPrice + sign * atr * atrTpMult,
    stopDistance,
  };
};

/**
 * Turns a signal into an executable order, or rejects it. Never mutates the account;
 * the caller applies the order's effects once a position is actually opened.
 */
export class RiskManager {
  private readonly config: RiskConfig;

  constructor(config: RiskConfig) {
    this.config = config;
  }

  public evaluate(request: OrderRequest, account: AccountState, atr: number | undefined): RiskDecision {
    // 1. Circuit breakers
    if (account.tradesTodayCount >= this.config.maxTradesPerDay) {
      return this.reject('MAX_TRADES', `Max trades per day reached (${this.config.maxTradesPerDay})`);
    }

    const dailyLossCap = account.equity * this.config.dailyLossLimit;
    if (account.dailyLossAccumulated >= dailyLossCap) {
      return this.reject(
        'DAILY_LOSS_LIMIT',
        `Daily loss limit hit: ${account.dailyLossAccumulated.toFixed(2)} >= ${dailyLossCap.toFixed(2)}`,
      );
    }

    // 2. Stop placement
    const levels = bracketLevels(request.direction, request.entryPrice, atr, this.config.atrSlMult, this.config.atrTpMult);
    if (levels === null) {
      return this.reject('INVALID_STOP_DISTANCE', `Stop distance unavailable (ATR: ${atr ?? 'n/a'})`);
    }

    // 3. Sizing
    const riskAmount = account.equity * this.config.riskPerTrade;
    const size = Math.floor(riskAmount / levels.stopDistance);
    if (size <= 0) {
      return this.reject(
        'INSUFFICIENT_RISK_BUDGET',
        `Risk budget ${riskAmount.toFixed(2)} below one unit at stop distance ${levels.stopDistance.toFixed(4)}`,
      );
    }

    return {
      status: 'ACCEPTED',
      order: Object.freeze({
        direction: request.direction,
        entryPrice: request.entryPrice,
        stopLoss: levels.stopLoss,
        takeProfit: levels.takeProfit,
        size,
        riskAmount,
      }),
    };
  }

  private reject(reason: RejectionReason, detail: string): RiskDecision {
    return { status: 'REJECTED', reason, detail };
  }
}
