import { consoleLogger } from '@batchline/core';

import type { Logger, LogLevel } from '@batchline/core';

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Drop messages below `level` before they reach `target`.
 */
export function createLevelLogger(level: LogLevel, target: Logger = consoleLogger): Logger {
  const enabled = (candidate: LogLevel): boolean => SEVERITY[candidate] >= SEVERITY[level];

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) target.debug(message, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) target.info(message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) target.warn(message, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) target.error(message, ...args);
    },
  };
}
