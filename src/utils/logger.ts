/**
 * Simple logger utility that writes to stderr
 * Keeps stdout free for the CLI's own report output
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: LogLevel = 'info';

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function write(level: LogLevel, message: string, details: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
    return;
  }

  process.stderr.write(`${new Date().toISOString()} [${level.toUpperCase()}] ${message}\n`);
  for (const detail of details) {
    if (detail instanceof Error) {
      process.stderr.write(`${detail.stack ?? detail.message}\n`);
    } else if (detail !== undefined) {
      process.stderr.write(`${JSON.stringify(detail, null, 2)}\n`);
    }
  }
}

export const logger = {
  debug: (message: string, ...details: unknown[]) => write('debug', message, details),
  info: (message: string, ...details: unknown[]) => write('info', message, details),
  warn: (message: string, ...details: unknown[]) => write('warn', message, details),
  error: (message: string, ...details: unknown[]) => write('error', message, details),
};

export type Logger = typeof logger;
