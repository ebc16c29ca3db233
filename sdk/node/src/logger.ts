/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Component-scoped console logger.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVEL_ENV = 'DEVICE_REST_LOG_LEVEL';

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

const levelFromEnv = (): LogLevel => {
  const raw = process.env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : 'info';
};

let threshold: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];

const write = (
  level: Exclude<LogLevel, 'silent'>,
  component: string,
  message: string,
  details?: Record<string, unknown>,
) => {
  if (!enabled(level)) return;
  const line = `[${component}] ${message}`;
  if (details && Object.keys(details).length > 0) {
    console[level](line, details);
  } else {
    console[level](line);
  }
};

export function createLogger(component: string): Logger {
  return {
    debug: (message, details) => write('debug', component, message, details),
    info: (message, details) => write('info', component, message, details),
    warn: (message, details) => write('warn', component, message, details),
    error: (message, details) => write('error', component, message, details),
  };
}
