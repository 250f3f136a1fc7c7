/**
 * Logger
 *
 * Level-filtered console logging. The starting level comes from the
 * JVM_INSPECTION_LOG_LEVEL environment variable.
 *
 * Levels: debug < info < warn < error
 */

import { getEnv } from './utils.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_ENV = 'JVM_INSPECTION_LOG_LEVEL';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Read the log level from the environment, falling back to 'info'
 */
export function getLogLevelFromEnv(): LogLevel {
  const envLevel = getEnv(LOG_LEVEL_ENV)?.trim().toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

let currentLevel: LogLevel = getLogLevelFromEnv();

/**
 * Override the level for the rest of the process
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

/**
 * Format a log message with timestamp and level prefix
 */
function formatMessage(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString();
  const prefix = level.toUpperCase().padEnd(5);
  return `[${timestamp}] [${prefix}] ${message}`;
}

function log(level: LogLevel, message: string, ...args: unknown[]): void {
  if (!shouldLog(level)) {
    return;
  }

  const formattedMessage = formatMessage(level, message);

  switch (level) {
    case 'debug':
    case 'info':
      console.log(formattedMessage, ...args);
      break;
    case 'warn':
      console.warn(formattedMessage, ...args);
      break;
    case 'error':
      console.error(formattedMessage, ...args);
      break;
  }
}

export const logger = {
  debug: (message: string, ...args: unknown[]): void => log('debug', message, ...args),
  info: (message: string, ...args: unknown[]): void => log('info', message, ...args),
  warn: (message: string, ...args: unknown[]): void => log('warn', message, ...args),
  error: (message: string, ...args: unknown[]): void => log('error', message, ...args),

  /** True when debug lines would be written */
  isDebugEnabled: (): boolean => shouldLog('debug'),
};

