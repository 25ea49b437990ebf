/**
 * Structured Logger
 * Leveled console logging with metadata
 */

import type { LogLevel, LogEntry } from '../types/index.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

const envLevel = process.env.LOG_LEVEL;
const currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

function colorize(level: LogLevel, text: string): string {
  const colors: Record<LogLevel, string> = {
    debug: '\x1b[90m',  // gray
    info: '\x1b[36m',   // cyan
    warn: '\x1b[33m',   // yellow
    error: '\x1b[31m'   // red
  };
  const reset = '\x1b[0m';
  return `${colors[level]}${text}${reset}`;
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>) {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: formatTimestamp(),
    level,
    message,
    ...(data && { data })
  };

  const prefix = colorize(level, `[${entry.timestamp}] [${level.toUpperCase()}]`);
  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  const line = `${prefix} ${message}${dataStr}`;

  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export const logger = {
  debug: (message: string, data?: Record<string, unknown>) => log('debug', message, data),
  info: (message: string, data?: Record<string, unknown>) => log('info', message, data),
  warn: (message: string, data?: Record<string, unknown>) => log('warn', message, data),
  error: (message: string, data?: Record<string, unknown>) => log('error', message, data),

  // Mirrors of what went into the audit log
  audit: {
    configChanged: (address: string, port: string) => {
      log('info', 'Server configuration changed', { address, port, audit: true });
    },
    commandRecorded: (command: string, product: string) => {
      log('info', 'Command recorded', { command, product, audit: true });
    }
  }
};
