import { pino, type Logger } from 'pino';
import type { LogLevel } from '../core/AugmenterConfig.ts';

export type { Logger };

export const LOGGER_NAME = 'otlp-metric-augmenter';

/** JSON logger on stdout, which Lambda forwards to CloudWatch Logs. */
export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({ name: LOGGER_NAME, level });
}
