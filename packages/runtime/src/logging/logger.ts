import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type LogDetails = Record<string, unknown>;

export interface Logger {
  debug(message: string, details?: LogDetails): void;
  info(message: string, details?: LogDetails): void;
  warn(message: string, details?: LogDetails): void;
  error(message: string, details?: LogDetails): void;
  /** 派生一个带子作用域前缀的 logger，例如 [AgentLoop:demo] */
  child(scope: string): Logger;
}

type WritableLevel = Exclude<LogLevel, "silent">;

/**
 * Console logger that prefixes every line with `[scope]` and drops anything
 * below `level`.
 */
export function createConsoleLogger(scope: string, level: LogLevel = "info"): Logger {
  const write = (target: WritableLevel, message: string, details?: LogDetails) => {
    if (LOG_LEVEL_RANK[target] < LOG_LEVEL_RANK[level]) {
      return;
    }
    const line = `[${scope}] ${message}`;
    const args: unknown[] = details === undefined ? [line] : [line, details];
    switch (target) {
      case "debug":
        console.debug(...args);
        break;
      case "info":
        console.info(...args);
        break;
      case "warn":
        console.warn(...args);
        break;
      case "error":
        console.error(...args);
        break;
    }
  };

  return {
    debug: (message, details) => write("debug", message, details),
    info: (message, details) => write("info", message, details),
    warn: (message, details) => write("warn", message, details),
    error: (message, details) => write("error", message, details),
    child: (childScope) => createConsoleLogger(`${scope}:${childScope}`, level),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
