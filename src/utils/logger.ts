import pino from 'pino';
import { env } from '../config/env';

export const logger = pino({
  name: 'signal-vote-backtester',
  level: env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL,
});
