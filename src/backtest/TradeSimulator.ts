import { Bar } from '../types/market';
import { Direction, ExitReason, directionSign } from '../types/trading';
import { ExecutionConfig } from '../config/EngineConfig';
import { OpenPosition } from './types';

export interface ExitFill {
  price: number;
  reason: Exclude<ExitReason, 'END_OF_DATA'>;
}

export class TradeSimulator {
  private readonly config: ExecutionConfig;

  constructor(config: ExecutionConfig) {
    this.config = config;
  }

  /**
   * Fill price for a new position: the spread is paid against the position direction.
   */
  public entryFill(price: number, direction: Direction): number {
    return price + directionSign(direction) * this.config.simulateSpread;
  }

  /**
   * Did this bar's range reach the stop or the target?
   * Intrabar order is unknown, so when both are touched the stop wins (worst case).
   */
  public checkExit(pos: OpenPosition, bar: Bar): ExitFill | null {
    const { stopLoss, takeProfit, direction } = pos.order;
    let level: number | null = null;
    let reason: ExitFill['reason'] | null = null;

    if (direction === 'LONG') {
      // LONG: SL is below entry, TP is above.
      if (bar.low <= stopLoss) {
        level = stopLoss;
        reason = 'STOP_LOSS';
      } else if (bar.high >= takeProfit) {
        level = takeProfit;
        reason = 'TAKE_PROFIT';
      }
    } else {
      // SHORT: SL is above entry, TP is below.
      if (bar.high >= stopLoss) {
        level = stopLoss;
        reason = 'STOP_LOSS';
      } else if (bar.low <= takeProfit) {
        level = takeProfit;
        reason = 'TAKE_PROFIT';
      }
    }

    if (level === null || reason === null) return null;
    return { price: this.applySlippage(level, direction), reason };
  }

  // Closing a LONG sells lower, closing a SHORT buys higher
  private applySlippage(price: number, direction: Direction): number {
    return price - directionSign(direction) * this.config.simulateSlippage;
  }
}
