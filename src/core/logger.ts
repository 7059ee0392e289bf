/**
 * Logger
 *
 * Scoped console logger. Debug output is only written when DEBUG is set
 * or verbose mode was requested on the command line.
 *
 * @module logger
 */

import chalk from 'chalk';
import { describeError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Receives fully formatted log lines
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  debug(message: string, detail?: unknown): void;
  info(message: string, detail?: unknown): void;
  warn(message: string, detail?: unknown): void;
  error(message: string, detail?: unknown): void;
  /** Create a logger for a nested scope sharing the same settings */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  verbose?: boolean;
  sink?: LogSink;
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

const levelStyle: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

function formatDetail(detail: unknown): string {
  if (detail === undefined) return '';
  if (detail instanceof Error || typeof detail === 'string') {
    return `: ${describeError(detail)}`;
  }
  try {
    return `: ${JSON.stringify(detail)}`;
  } catch {
    return `: ${String(detail)}`;
  }
}

/**
 * Create a scoped logger
 *
 * @example
 * ```typescript
 * const log = createLogger('navigator', { verbose: true });
 * log.debug('transition', { from: 'main_menu', to: 'list_videos' });
 * ```
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? Boolean(process.env.DEBUG);
  const sink = options.sink ?? consoleSink;

  const write = (level: LogLevel, message: string, detail: unknown): void => {
    if (level === 'debug' && !verbose) return;
    const tag = levelStyle[level](`[${scope}]`);
    sink(level, `${tag} ${message}${formatDetail(detail)}`);
  };

  return {
    debug: (message, detail) => write('debug', message, detail),
    info: (message, detail) => write('info', message, detail),
    warn: (message, detail) => write('warn', message, detail),
    error: (message, detail) => write('error', message, detail),
    child: (child) => createLogger(`${scope}:${child}`, { verbose, sink }),
  };
}
