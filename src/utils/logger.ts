/**
 * Leveled diagnostics on stderr.
 *
 * stdout carries the scan banner, the summary table and export messages;
 * everything written here goes to stderr so it can be redirected separately.
 * Lines are prefixed with the emitting module, e.g. `[bfs-crawler]`.
 */

import { config, type LogLevel } from "../config.js";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[config.logLevel];
}

function formatMessage(scope: string, message: string, args: unknown[]): string {
  const argsStr =
    args.length > 0
      ? " " +
        args
          .map((arg) => (typeof arg === "object" ? JSON.stringify(arg) : String(arg)))
          .join(" ")
      : "";
  return `[${scope}] ${message}${argsStr}`;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Create a logger whose lines carry `[scope]`.
 *
 * @example
 * ```ts
 * const log = createLogger("bfs-crawler");
 * log.warn("Task failed", "https://example.com/a");
 * // stderr: [bfs-crawler] Task failed https://example.com/a
 * ```
 */
export function createLogger(scope: string): Logger {
  const write =
    (level: LogLevel) =>
    (message: string, ...args: unknown[]): void => {
      if (shouldLog(level)) {
        console.error(formatMessage(scope, message, args));
      }
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}
