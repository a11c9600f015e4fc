import pino from 'pino';
import type { Logger } from 'pino';

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export const logger = pino({ level: defaultLevel(), base: { service: 'sentinel-trader' } });

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

export type { Logger };
