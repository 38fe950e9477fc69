import type { Logger } from "@bb-coverage/core";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANKS: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface ConsoleLoggerOptions {
  /**
   * Minimum level of the messages to print. Default: `"info"`.
   */
  level?: LogLevel;
  /**
   * Prepended to every message. Default: `"[basicblock]"`.
   */
  prefix?: string;
  /**
   * Default: the global `console`.
   */
  console?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

/**
 * Logger discarding every message.
 */
export const nullLogger: Logger = Object.freeze({
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
});

/**
 * Creates a logger writing through a console object.
 *
 * Each call creates an independent logger: there is no shared logging state.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const minRank: number = LEVEL_RANKS[options.level ?? "info"];
  const prefix: string = options.prefix ?? "[basicblock]";
  const out: Pick<Console, "debug" | "info" | "warn" | "error"> = options.console ?? console;

  function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_RANKS[level] < minRank) {
      return;
    }
    if (data === undefined) {
      out[level](`${prefix} ${message}`);
    } else {
      out[level](`${prefix} ${message}`, data);
    }
  }

  return {
    debug: (message: string, data?: Record<string, unknown>): void => log("debug", message, data),
    info: (message: string, data?: Record<string, unknown>): void => log("info", message, data),
    warn: (message: string, data?: Record<string, unknown>): void => log("warn", message, data),
    error: (message: string, data?: Record<string, unknown>): void => log("error", message, data),
  };
}
