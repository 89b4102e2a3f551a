import { pino } from 'pino';
import type { Logger } from 'pino';

export interface LoggerOptions {
  name?: string;
  /** pino level name, or `silent`. */
  level?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'coordinator',
    level: options.level || process.env.LOG_LEVEL || 'info',
  });
}
