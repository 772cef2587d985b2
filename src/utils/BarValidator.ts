import { z } from 'zod';
import { Bar } from '../types/market';
import { DataError } from '../core/errors';

const price = z.number().finite().positive();

export const barSchema = z
  .object({
    timestamp: z.number().int().nonnegative(),
    open: price,
    high: price,
    low: price,
    close: price,
    volume: z.number().finite().nonnegative(),
  })
  .refine((b) => b.high >= b.low, { message: 'high is below low', path: ['high'] })
  .refine((b) => b.high >= Math.max(b.open, b.close), { message: 'high is below open/close', path: ['high'] })
  .refine((b) => b.low <= Math.min(b.open, b.close), { message: 'low is above open/close', path: ['low'] });

/**
 * Rejects malformed series before anything is computed from them.
 * Bars must be well-formed, strictly increasing in time, and at least `warmupBars` long.
 */
export const validateBars = (bars: readonly Bar[], warmupBars: number): void => {
  if (bars.length === 0) {
    throw new DataError('No bars supplied');
  }
  if (bars.length < warmupBars) {
    throw new DataError(`Need at least ${warmupBars} bars for warm-up, got ${bars.length}`);
  }

  for (let i = 0; i < bars.length; i++) {
    const result = barSchema.safeParse(bars[i]);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new DataError(`Bar ${i}: ${issue.path.join('.') || 'bar'} ${issue.message}`);
    }
    if (i > 0 && bars[i].timestamp <= bars[i - 1].timestamp) {
      throw new DataError(`Bar ${i}: timestamp ${bars[i].timestamp} is not after ${bars[i - 1].timestamp}`);
    }
  }
};
