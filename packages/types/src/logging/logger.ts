/* eslint-disable no-console */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  /** Defaults to stderr so that JSON on stdout stays machine-readable. */
  write?: (line: string) => void;
}

/**
 * Leveled logger writing `[LEVEL] message` lines. Debug lines are only written when
 * `verbose` is set.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => console.error(line));
  const verbose = options.verbose ?? false;

  const emit = (level: LogLevel, message: string): void => {
    if (level === 'debug' && !verbose) return;
    write(`[${level.toUpperCase()}] ${message}`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
