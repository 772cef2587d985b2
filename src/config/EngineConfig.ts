import { z, ZodError } from 'zod';
import { ConfigError } from '../core/errors';
import { StrategyName, TieBreakMethod } from '../types/trading';
import { env } from './env';

export const STRATEGY_NAMES = [
  'ema_crossover',
  'rsi_reversal',
  'macd_crossover',
  'bollinger_breakout',
] as const satisfies readonly StrategyName[];

export const TIE_BREAK_METHODS = ['score', 'priority', 'adx_trend', 'conservative', 'momentum'] as const satisfies readonly TieBreakMethod[];

const period = z.number().int().positive();
const multiplier = z.number().positive();

const indicatorSchema = z
  .object({
    emaFast: period.default(12),
    emaSlow: period.default(26),
    macdSignal: period.default(9),
    rsiPeriod: period.default(14),
    atrPeriod: period.default(14),
    bbPeriod: period.default(20),
    bbK: multiplier.default(2),
    stochK: period.default(14),
    stochD: period.default(3),
    adxPeriod: period.default(14),
    cciPeriod: period.default(20),
    rocPeriod: period.default(10),
    momentumPeriod: period.default(10),
    williamsPeriod: period.default(14),
  })
  .refine((c) => c.emaFast < c.emaSlow, { message: 'emaFast must be shorter than emaSlow', path: ['emaFast'] })
  .readonly();

const votingSchema = z.object({
  enabledStrategies: z.array(z.enum(STRATEGY_NAMES)).min(1).readonly().default([...STRATEGY_NAMES]),
  minStrategyVotes: z.number().int().positive().default(2),
  tieBreakMethod: z.enum(TIE_BREAK_METHODS).default('score'),
  rsiOversold: z.number().min(0).max(100).default(30),
  rsiOverbought: z.number().min(0).max(100).default(70),
  macdAdxMin: z.number().nonnegative().default(20),
}).readonly();

const riskSchema = z.object({
  capital: z.number().positive().default(10000),
  riskPerTrade: z.number().positive().max(1).default(0.01),
  atrSlMult: multiplier.default(1.5),
  atrTpMult: multiplier.default(2.0),
  dailyLossLimit: z.number().positive().max(1).default(0.03),
  maxTradesPerDay: z.number().int().positive().default(5),
}).readonly();

const executionSchema = z.object({
  simulateSpread: z.number().nonnegative().default(0),
  simulateSlippage: z.number().nonnegative().default(0),
}).readonly();

// Parsed configs are frozen at every level
export const engineConfigSchema = z.object({
  indicators: indicatorSchema.default({}),
  voting: votingSchema.default({}),
  risk: riskSchema.default({}),
  execution: executionSchema.default({}),
  warmupBars: z.number().int().nonnegative().default(50),
  periodsPerYear: z.number().positive().default(252),
}).readonly();

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;
export type IndicatorConfig = EngineConfig['indicators'];
export type VotingConfig = EngineConfig['voting'];
export type RiskConfig = EngineConfig['risk'];
export type ExecutionConfig = EngineConfig['execution'];

const formatIssues = (error: ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

/**
 * Validates raw configuration and fills defaults. Throws ConfigError before any bar is touched.
 */
export const parseEngineConfig = (input: EngineConfigInput = {}): EngineConfig => {
  const parsed = engineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('Invalid engine configuration', formatIssues(parsed.error));
  }
  const config = parsed.data;
  if (config.voting.minStrategyVotes > config.voting.enabledStrategies.length) {
    throw new ConfigError('Invalid engine configuration', [
      `voting.minStrategyVotes: ${config.voting.minStrategyVotes} exceeds the ${config.voting.enabledStrategies.length} enabled strategies`,
    ]);
  }
  return config;
};

// Balanced: all four strategies, two votes needed, ties resolved by confirmation score
export const DEFAULT_CONFIG: EngineConfig = parseEngineConfig();

// Strict: three of four must agree, ties never traded
export const CONSERVATIVE_CONFIG: EngineConfig = parseEngineConfig({
  voting: { minStrategyVotes: 3, tieBreakMethod: 'conservative' },
  risk: { riskPerTrade: 0.005, dailyLossLimit: 0.02, maxTradesPerDay: 3 },
});

// Any single strategy can trigger, ties follow strategy priority
export const AGGRESSIVE_CONFIG: EngineConfig = parseEngineConfig({
  voting: { minStrategyVotes: 1, tieBreakMethod: 'priority' },
  risk: { riskPerTrade: 0.015, dailyLossLimit: 0.05, maxTradesPerDay: 10 },
});

/**
 * Engine configuration seeded from the environment (ACCOUNT_BALANCE, RISK_PER_TRADE, WARMUP_BARS).
 * Explicit overrides win over the environment.
 */
export const configFromEnv = (overrides: EngineConfigInput = {}): EngineConfig =>
  parseEngineConfig({
    ...overrides,
    risk: {
      ...overrides.risk,
      capital: overrides.risk?.capital ?? env.ACCOUNT_BALANCE,
      riskPerTrade: overrides.risk?.riskPerTrade ?? env.RISK_PER_TRADE,
    },
    warmupBars: overrides.warmupBars ?? env.WARMUP_BARS,
  });
