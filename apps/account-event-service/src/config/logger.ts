import { config } from "./index";

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

export interface Logger {
  error(message: string, context?: unknown): void;
  warn(message: string, context?: unknown): void;
  info(message: string, context?: unknown): void;
  debug(message: string, context?: unknown): void;
}

/**
 * Console logger that prefixes every line with `[tag]`
 */
export function createLogger(tag: string, level: LogLevel = config.logLevel): Logger {
  const enabled = (wanted: LogLevel) => LEVELS[wanted] <= LEVELS[level];

  const write = (wanted: LogLevel, method: "error" | "warn" | "log" | "debug") =>
    (message: string, context?: unknown) => {
      if (!enabled(wanted)) return;
      if (context === undefined) {
        console[method](`[${tag}] ${message}`);
      } else {
        console[method](`[${tag}] ${message}`, context);
      }
    };

  return {
    error: write("error", "error"),
    warn: write("warn", "warn"),
    info: write("info", "log"),
    debug: write("debug", "debug"),
  };
}
