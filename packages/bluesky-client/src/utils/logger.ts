/**
 * Simple scoped logger
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: Record<LogLevel, number> = {
  silent: -1,
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface Logger {
  error(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  debug(msg: string, ...args: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function formatTime(): string {
  return new Date().toISOString().slice(11, 23);
}

export function createLogger(scope: string, level: string = process.env.LOG_LEVEL || 'info'): Logger {
  const currentLevel = isLogLevel(level) ? LOG_LEVELS[level] : LOG_LEVELS.info;
  const tag = `[${scope}]`;

  return {
    error: (msg, ...args) => {
      if (currentLevel >= 0) {
        console.error(`[${formatTime()}] ${tag} ❌ ${msg}`, ...args);
      }
    },
    warn: (msg, ...args) => {
      if (currentLevel >= 1) {
        console.warn(`[${formatTime()}] ${tag} ⚠️ ${msg}`, ...args);
      }
    },
    info: (msg, ...args) => {
      if (currentLevel >= 2) {
        console.log(`[${formatTime()}] ${tag} ℹ️ ${msg}`, ...args);
      }
    },
    debug: (msg, ...args) => {
      if (currentLevel >= 3) {
        console.log(`[${formatTime()}] ${tag} 🔍 ${msg}`, ...args);
      }
    },
  };
}
