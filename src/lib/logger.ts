/**
 * Centralized logging utility that respects the configured level
 */

import { getConfig, type LogLevel } from './config';
import { sanitizeLogPayload } from './logSanitizer';

const PREFIX = '[Journal]';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[getConfig().logLevel];
}

function details(args: unknown[]): unknown[] {
  return args.map((arg) => sanitizeLogPayload(arg));
}

export const logger = {
  log: (...args: unknown[]) => {
    if (enabled('info')) {
      console.log(PREFIX, ...details(args));
    }
  },
  warn: (...args: unknown[]) => {
    if (enabled('warn')) {
      console.warn(PREFIX, ...details(args));
    }
  },
  error: (...args: unknown[]) => {
    if (enabled('error')) {
      console.error(PREFIX, ...details(args));
    }
  },
  debug: (...args: unknown[]) => {
    if (enabled('debug') && getConfig().isDev) {
      console.log(`${PREFIX} DEBUG`, ...details(args));
    }
  },
};
