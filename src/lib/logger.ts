/**
 * Diagnostic Logger
 *
 * Levelled logger for library code. Everything goes to stderr so that
 * report output on stdout (tables, JSON) stays clean.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env.TOKENTALLY_LOG?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : 'warn';
}

let currentLevel: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function formatData(data?: Record<string, unknown>): string {
  if (!data || Object.keys(data).length === 0) return '';
  const parts = Object.entries(data).map(([key, value]) => {
    if (value instanceof Error) return `${key}=${value.message}`;
    return `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`;
  });
  return ' ' + chalk.dim(parts.join(' '));
}

function write(level: Exclude<LogLevel, 'silent'>, scope: string, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;

  const prefix = chalk.dim(`[${scope}]`);
  let label: string;
  switch (level) {
    case 'debug':
      label = chalk.gray('debug');
      break;
    case 'info':
      label = chalk.cyan('info');
      break;
    case 'warn':
      label = chalk.yellow('warn');
      break;
    case 'error':
      label = chalk.red('error');
      break;
  }

  console.error(`${label} ${prefix} ${message}${formatData(data)}`);
}

/**
 * Create a logger whose lines are tagged with `scope`
 */
export function createLogger(scope: string): Logger {
  return {
    debug: (message, data) => write('debug', scope, message, data),
    info: (message, data) => write('info', scope, message, data),
    warn: (message, data) => write('warn', scope, message, data),
    error: (message, data) => write('error', scope, message, data),
  };
}
