/**
 * Scoped logger
 *
 * Prefixes every line with `[Scope]` and writes to the console unless a
 * sink is supplied. Debug lines are dropped unless `verbose` is set.
 */

import type { Logger, LogLevel, LogSink } from '../types.mjs';

export interface LoggerOptions {
  verbose?: boolean;
  sink?: LogSink;
}

export const consoleSink: LogSink = (level, message, ...args) => {
  switch (level) {
    case 'debug':
      console.debug(message, ...args);
      break;
    case 'info':
      console.log(message, ...args);
      break;
    case 'warn':
      console.warn(message, ...args);
      break;
    case 'error':
      console.error(message, ...args);
      break;
  }
};

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? consoleSink;
  const verbose = options.verbose ?? false;

  const emit = (level: LogLevel, message: string, args: unknown[]): void => {
    if (level === 'debug' && !verbose) return;
    sink(level, `[${scope}] ${message}`, ...args);
  };

  return {
    debug: (message, ...args) => emit('debug', message, args),
    info: (message, ...args) => emit('info', message, args),
    warn: (message, ...args) => emit('warn', message, args),
    error: (message, ...args) => emit('error', message, args),
  };
}
