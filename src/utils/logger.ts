/**
 * Console logger with a level threshold.
 * The threshold is process-wide and set once from config or the CLI flags.
 */

const LOG_LEVELS = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

let threshold: LogLevel = 'info';

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[threshold];
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (enabled('debug')) console.debug(message, ...args);
  },
  info(message: string, ...args: unknown[]): void {
    if (enabled('info')) console.info(message, ...args);
  },
  warn(message: string, ...args: unknown[]): void {
    if (enabled('warn')) console.warn(message, ...args);
  },
  error(message: string, ...args: unknown[]): void {
    if (enabled('error')) console.error(message, ...args);
  },
};
