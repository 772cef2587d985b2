import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.join(__dirname, '../../.env') });
const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  YAHOO_API_URL: z.string().url().default('https://query1.finance.yahoo.com'),
  ACCOUNT_BALANCE: z.coerce.number().positive().default(10000),
  RISK_PER_TRADE: z.coerce.number().positive().max(1).default(0.01),
  WARMUP_BARS: z.coerce.number().int().nonnegative().default(50),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.format());
  process.exit(1);
}

export const env = parsed.data;
