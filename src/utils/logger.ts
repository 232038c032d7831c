import process from 'node:process';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info';

const order: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(order, value);
}

function currentLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : 'info';
}

function enabled(level: LogLevel): boolean {
  return order[currentLevel()] >= order[level];
}

export function log(...args: unknown[]): void {
  if (enabled('info')) console.log(...args);
}

export function warn(...args: unknown[]): void {
  if (enabled('warn')) console.warn(...args);
}

export function error(...args: unknown[]): void {
  if (enabled('error')) console.error(...args);
}
