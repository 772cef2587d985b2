import { parseArgs } from 'util';
import { BacktestEngine } from '../backtest/BacktestEngine';
import { formatBacktestResult } from '../backtest/report';
import { MarketDataEngine } from '../engine/MarketDataEngine';
import { LiveSignalService } from '../engine/LiveSignalService';
import { YahooAdapter } from '../engine/sources/YahooAdapter';
import { loadCsvFile } from '../engine/sources/CsvAdapter';
import {
  AGGRESSIVE_CONFIG,
  CONSERVATIVE_CONFIG,
  EngineConfig,
  EngineConfigInput,
  configFromEnv,
} from '../config/EngineConfig';
import { TIMEFRAME_MINUTES, Timeframe } from '../types/market';
import { ConfigError } from '../core/errors';
import { logger } from '../utils/logger';

export type Preset = 'default' | 'conservative' | 'aggressive';

export interface CliOptions {
  csv?: string;
  symbol: string;
  interval: Timeframe;
  limit: number;
  preset: Preset;
  live: boolean;
}

const isTimeframe = (value: string): value is Timeframe => Object.hasOwn(TIMEFRAME_MINUTES, value);
const isPreset = (value: string): value is Preset => ['default', 'conservative', 'aggressive'].includes(value);

export const parseCliArgs = (argv: string[]): CliOptions => {
  const { values } = parseArgs({
    args: argv,
    options: {
      csv: { type: 'string' },
      symbol: { type: 'string', default: 'EURUSD' },
      interval: { type: 'string', default: '1h' },
      limit: { type: 'string', default: '1000' },
      preset: { type: 'string', default: 'default' },
      live: { type: 'boolean', default: false },
    },
  });

  const interval = values.interval ?? '1h';
  if (!isTimeframe(interval)) {
    throw new ConfigError('Invalid arguments', [`interval: expected one of ${Object.keys(TIMEFRAME_MINUTES).join(', ')}`]);
  }
  const preset = values.preset ?? 'default';
  if (!isPreset(preset)) {
    throw new ConfigError('Invalid arguments', ['preset: expected default, conservative or aggressive']);
  }
  const limit = Number(values.limit);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ConfigError('Invalid arguments', ['limit: expected a positive integer']);
  }

  return {
    csv: values.csv,
    symbol: values.symbol ?? 'EURUSD',
    interval,
    limit,
    preset,
    live: values.live ?? false,
  };
};

const PRESETS: Record<Exclude<Preset, 'default'>, EngineConfigInput> = {
  conservative: CONSERVATIVE_CONFIG,
  aggressive: AGGRESSIVE_CONFIG,
};

// Presets fix the voting and risk rules; capital and warm-up still come from the environment
export const configForPreset = (preset: Preset): EngineConfig => {
  if (preset === 'default') return configFromEnv();
  const base = PRESETS[preset];
  return configFromEnv({ voting: base.voting, risk: { ...base.risk, capital: undefined } });
};

const main = async () => {
  const options = parseCliArgs(process.argv.slice(2));
  const config = configForPreset(options.preset);

  if (options.live) {
    const marketData = new MarketDataEngine([new YahooAdapter()]);
    const live = await new LiveSignalService(marketData, config, options.limit).evaluate(options.symbol, options.interval);
    const { evaluation, decision } = live;
    console.log(`${options.symbol} @ ${new Date(live.timestamp).toISOString()}: ${evaluation.outcome.kind}`);
    for (const vote of evaluation.votes) {
      console.log(`   ${vote.strategy.padEnd(20)} ${vote.direction.padEnd(8)} ${vote.score.toFixed(2)}`);
    }
    if (evaluation.signal) console.log('   Signal:', evaluation.signal);
    if (decision) console.log('   Decision:', decision);
    return;
  }

  const symbol = options.csv ?? options.symbol;
  const bars = options.csv
    ? await loadCsvFile(options.csv)
    : await new MarketDataEngine([new YahooAdapter()]).getBars(options.symbol, options.interval, options.limit);

  const result = new BacktestEngine(config).runBacktest(bars, symbol);
  console.log(formatBacktestResult(result));
};

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.fatal({ error }, 'Backtest failed');
    process.exitCode = 1;
  });
}
