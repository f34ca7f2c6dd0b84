import { appendFile, mkdirSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { paths } from './paths.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const levelPriority: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

let levelOverride: LogLevel | undefined;

/** Pin the level. `undefined` goes back to LOG_LEVEL. */
export function setLogLevel(level: LogLevel | undefined): void {
  levelOverride = level;
}

export function getLogLevel(): LogLevel {
  if (levelOverride) return levelOverride;
  const env = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(env) ? env : 'info';
}

export function getLogFile(date: Date = new Date()): string {
  const day = date.toISOString().split('T')[0];
  return join(paths.fromDataDir('logs'), `context-engine-${day}.log`);
}

function write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (levelPriority[level] < levelPriority[getLogLevel()]) return;

  const logDir = paths.fromDataDir('logs');
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const entry = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...data,
  });

  appendFile(getLogFile(), entry + '\n', (err) => {
    if (err) {
      process.stderr.write(`Logger error: ${err.message}\n`);
    }
  });
}

export const logger: Logger = {
  debug: (message, data) => write('debug', message, data),
  info: (message, data) => write('info', message, data),
  warn: (message, data) => write('warn', message, data),
  error: (message, data) => write('error', message, data),
};
