/**
 * Console logger with `[component]` prefixes, gated by LOG_LEVEL.
 * Defaults to 'info'; tests run with LOG_LEVEL=error.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

function currentLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  return isLogLevel(configured) ? configured : "info";
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel()];
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown): void;
}

export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;

  return {
    debug: (message, data) => {
      if (!shouldLog("debug")) return;
      if (data) console.log(prefix, message, data);
      else console.log(prefix, message);
    },
    info: (message, data) => {
      if (!shouldLog("info")) return;
      if (data) console.log(prefix, message, data);
      else console.log(prefix, message);
    },
    warn: (message, data) => {
      if (!shouldLog("warn")) return;
      if (data) console.warn(prefix, message, data);
      else console.warn(prefix, message);
    },
    error: (message, error) => {
      if (!shouldLog("error")) return;
      if (error instanceof Error) console.error(prefix, message, { error: error.message });
      else if (error !== undefined) console.error(prefix, message, error);
      else console.error(prefix, message);
    },
  };
}
