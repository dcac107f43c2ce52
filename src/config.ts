/**
 * @module config
 * @fileoverview Centralized application configuration loaded from environment variables.
 *
 * All settings have defaults, so the checker runs with nothing but a URL.
 * Command-line flags (see `cli/options.ts`) override the values loaded here;
 * this module only supplies the baseline.
 *
 * ## Architecture Position
 * This module sits at the bottom of the dependency graph. It is imported by
 * the crawler, the HTTP client and the CLI, and imports nothing from the
 * application itself.
 *
 * ```
 *  +-----------+   +-----------+   +-----------+
 *  |    cli    |   |  crawler  |   | services  |
 *  +-----+-----+   +-----+-----+   +-----+-----+
 *        |               |               |
 *        +-------+-------+-------+-------+
 *                |               |
 *          +-----v-----+  +-----v-----+
 *          |   config   |  |   utils   |
 *          +-----------+  +-----------+
 * ```
 *
 * ## Environment Variable Naming Convention
 * - All uppercase with underscores (SCREAMING_SNAKE_CASE).
 * - Numeric values are parsed with `parseInt(..., 10)`.
 *
 * @example
 * ```ts
 * import { config } from "./config.js";
 * console.log(config.fetchTimeout); // 10000 (or whatever env says)
 *
 * process.env.MAX_DEPTH = "2";
 * const testConfig = loadConfig();
 * console.log(testConfig.defaultMaxDepth); // 2
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/** Log verbosity accepted by `LOG_LEVEL`. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Complete application configuration.
 *
 * Every field is required and has a default.
 */
export interface AppConfig {
  /**
   * Maximum crawl depth when `--depth` is not given. The seed page is depth 0.
   *
   * @default 5
   */
  defaultMaxDepth: number;

  /**
   * Number of fetches allowed in flight when `--threads` is not given.
   *
   * @default 10
   */
  defaultConcurrency: number;

  /**
   * Per-request timeout in milliseconds. A request that exceeds it is
   * recorded as a transport error.
   *
   * @default 10000
   */
  fetchTimeout: number;

  /**
   * Maximum number of body bytes read from one response. Bodies beyond the
   * limit are truncated; only links in the first `maxResponseSize` bytes
   * are discovered.
   *
   * @default 10485760
   */
  maxResponseSize: number;

  /**
   * User-Agent header sent with every request.
   *
   * @default "site-link-checker/1.0"
   */
  userAgent: string;

  /**
   * Minimum milliseconds between two progress lines on stderr.
   *
   * @default 250
   */
  progressInterval: number;

  /**
   * Diagnostics below this level are not written.
   *
   * @default "info"
   */
  logLevel: LogLevel;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Config Loader
 * ──────────────────────────────────────────────────────────────────────────── */

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function parseLogLevel(value: string | undefined): LogLevel {
  const lower = value?.toLowerCase();
  return LOG_LEVELS.find((level) => level === lower) ?? "info";
}

/**
 * Read environment variables and build a complete {@link AppConfig}.
 *
 * Reads `process.env` at call time and returns a plain object, so tests can
 * set variables and call it again.
 *
 * Numeric values are passed through as parsed; range validation happens in
 * the CLI layer, where an out-of-range value becomes a `ConfigError`.
 */
export function loadConfig(): AppConfig {
  return {
    defaultMaxDepth: parseInt(process.env.MAX_DEPTH ?? "5", 10),
    defaultConcurrency: parseInt(process.env.MAX_CONCURRENT ?? "10", 10),
    fetchTimeout: parseInt(process.env.FETCH_TIMEOUT ?? "10000", 10),
    maxResponseSize: parseInt(process.env.MAX_RESPONSE_SIZE ?? "10485760", 10),
    userAgent: process.env.USER_AGENT ?? "site-link-checker/1.0",
    progressInterval: parseInt(process.env.PROGRESS_INTERVAL ?? "250", 10),
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Singleton Export
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Pre-loaded configuration singleton, evaluated once at module load time.
 *
 * If you need a fresh config (e.g., in tests), call {@link loadConfig} directly.
 */
export const config: AppConfig = loadConfig();
