import { AccountState, Direction, Order, Signal, Trade } from '../types/trading';
import { RejectionReason } from '../execution/RiskManager';
import { EngineConfig } from '../config/EngineConfig';

/**
 * Position slot state machine: FLAT -> OPEN -> CLOSED. A CLOSED position is archived
 * to the ledger and the slot returns to FLAT.
 */
export type PositionState =
  | { readonly status: 'FLAT' }
  | {
      readonly status: 'OPEN';
      readonly id: number;
      readonly order: Order;
      readonly entryPrice: number; // fill, after spread
      readonly entryTime: number;
    }
  | {
      readonly status: 'CLOSED';
      readonly id: number;
      readonly order: Order;
      readonly trade: Trade;
    };

export type FlatSlot = Extract<PositionState, { status: 'FLAT' }>;
export type OpenPosition = Extract<PositionState, { status: 'OPEN' }>;
export type ClosedPosition = Extract<PositionState, { status: 'CLOSED' }>;
export type PositionSlot = FlatSlot | OpenPosition;

export interface EquityPoint {
  readonly timestamp: number;
  readonly equity: number;
}

export interface RiskRejection {
  readonly timestamp: number;
  readonly barIndex: number;
  readonly direction: Direction;
  readonly reason: RejectionReason;
  readonly detail: string;
}

export interface DrawdownPoint {
  readonly timestamp: number;
  readonly drawdown: number; // absolute, <= 0
  readonly drawdownPct: number; // fraction, <= 0
}

export interface PerformanceReport {
  readonly bars: number;
  readonly cagr: number | null;
  readonly sharpe: number | null;
  readonly sortino: number | null;
  readonly maxDrawdown: number; // fraction, <= 0
  readonly maxDrawdownAmount: number; // absolute, <= 0
  readonly winRate: number; // 0-1
  readonly profitFactor: number | null;
  readonly totalTrades: number;
  readonly winningTrades: number;
  readonly losingTrades: number;
  readonly grossProfit: number;
  readonly grossLoss: number;
  readonly totalPnl: number;
  readonly totalPnlPercent: number;
  readonly avgPnl: number;
  readonly avgWin: number;
  readonly avgLoss: number;
  readonly bestTrade: number;
  readonly worstTrade: number;
  readonly avgDurationMinutes: number;
  readonly initialEquity: number;
  readonly finalEquity: number;
  readonly drawdowns: readonly DrawdownPoint[];
}

export interface BacktestResult {
  readonly symbol: string;
  readonly startDate: number;
  readonly endDate: number;
  readonly config: EngineConfig;
  readonly trades: readonly Trade[];
  readonly positions: readonly ClosedPosition[];
  readonly equityCurve: readonly EquityPoint[];
  readonly signals: readonly Signal[];
  readonly orders: readonly Order[];
  readonly rejections: readonly RiskRejection[];
  readonly finalAccount: AccountState;
  readonly report: PerformanceReport;
}
