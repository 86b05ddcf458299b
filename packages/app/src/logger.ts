import type { Logger, LogLevel } from '@agent-mesh/core';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Console logger printing `[LEVEL] [scope] message`. Messages below `level`
 * are dropped.
 */
export function createConsoleLogger(level: LogLevel = 'info', scope?: string): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = (name: LogLevel): string =>
    scope ? `[${name.toUpperCase()}] [${scope}]` : `[${name.toUpperCase()}]`;
  const enabled = (name: LogLevel): boolean => LEVEL_ORDER[name] >= threshold;

  return {
    debug: (msg, ...args) => {
      if (enabled('debug')) console.debug(`${prefix('debug')} ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled('info')) console.log(`${prefix('info')} ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled('warn')) console.warn(`${prefix('warn')} ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled('error')) console.error(`${prefix('error')} ${msg}`, ...args);
    },
  };
}

/** Prefix every message with `[scope]`, keeping the parent's level and sink. */
export function withScope(logger: Logger, scope: string): Logger {
  return {
    debug: (msg, ...args) => logger.debug(`[${scope}] ${msg}`, ...args),
    info: (msg, ...args) => logger.info(`[${scope}] ${msg}`, ...args),
    warn: (msg, ...args) => logger.warn(`[${scope}] ${msg}`, ...args),
    error: (msg, ...args) => logger.error(`[${scope}] ${msg}`, ...args),
  };
}
