export * from './types/market';
export * from './types/trading';
export * from './core/errors';
export * from './config/EngineConfig';
export * from './analysis/indicators';
export { BaseStrategy, StrategyContext, StrategyVerdict } from './core/BaseStrategy';
export * from './strategies';
export * from './engine/TieBreaker';
export * from './engine/SignalEngine';
export * from './execution/RiskManager';
export { AccountManager, tradingDayOf } from './core/AccountManager';
export { BacktestEngine } from './backtest/BacktestEngine';
export { Portfolio, calculatePnl } from './backtest/Portfolio';
export { TradeSimulator, ExitFill } from './backtest/TradeSimulator';
export { MetricsCalculator, MetricsOptions } from './backtest/Metrics';
export * from './backtest/types';
export { formatBacktestResult, reportLines } from './backtest/report';
export { validateBars, barSchema } from './utils/BarValidator';
export { BarSource } from './engine/BarSource';
export { MarketDataEngine, MarketDataOptions, normalizeBars } from './engine/MarketDataEngine';
export { LiveSignalService, LiveSignal } from './engine/LiveSignalService';
export { YahooApiClient, YahooClientOptions } from './client/YahooApiClient';
export { YahooAdapter, normalizeSymbol, historyDays } from './engine/sources/YahooAdapter';
export { CsvAdapter, loadCsvFile, parseCsvBars } from './engine/sources/CsvAdapter';
