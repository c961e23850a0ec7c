import { config, LogLevel } from "./config";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
}

export function isLevelEnabled(level: LogLevel, threshold: LogLevel = config.logLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * Console logger prefixing every line with "[tag]".
 * Lines below the threshold (LOG_LEVEL by default) are dropped.
 */
export function createLogger(tag: string, threshold: LogLevel = config.logLevel): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (message, ...details) => {
      if (isLevelEnabled("debug", threshold)) console.log(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (isLevelEnabled("info", threshold)) console.log(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (isLevelEnabled("warn", threshold)) console.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (isLevelEnabled("error", threshold)) console.error(`${prefix} ${message}`, ...details);
    },
  };
}
