/**
 * Leveled console logger used by the runner, datasets and model adapters.
 */

import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Receives already-formatted lines. Defaults to the console. */
export type LogSink = (level: Exclude<LogLevel, 'silent'>, line: string) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

const LEVEL_TAG: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
  debug: (text) => chalk.gray(text),
  info: (text) => chalk.cyan(text),
  warn: (text) => chalk.yellow(text),
  error: (text) => chalk.red(text),
};

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(opts?: { level?: LogLevel; scope?: string; sink?: LogSink }): Logger {
  const threshold = LEVEL_RANK[opts?.level ?? 'info'];
  const sink = opts?.sink ?? consoleSink;
  const prefix = opts?.scope ? `${chalk.dim(`[${opts.scope}]`)} ` : '';

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string) => {
    if (LEVEL_RANK[level] < threshold) return;
    sink(level, `${LEVEL_TAG[level](level.toUpperCase())}: ${prefix}${message}`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
