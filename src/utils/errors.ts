/**
 * @module utils/errors
 * @fileoverview Custom error class hierarchy for the link checker.
 *
 * Every error raised by this application extends {@link LinkCheckerError},
 * which carries a machine-readable `code` string alongside the human-readable
 * `message`. The code survives when an error is flattened into a string for a
 * broken-link record or a log line.
 *
 * ## Error Hierarchy
 * ```
 * Error (built-in)
 *   └── LinkCheckerError (base)  ─── code: string
 *         ├── FetchError          ─── "FETCH_FAILED"
 *         ├── TimeoutError        ─── "TIMEOUT"
 *         ├── ConfigError         ─── "INVALID_CONFIG"
 *         └── ExportError         ─── "EXPORT_FAILED"
 * ```
 *
 * Only `ConfigError` and `ExportError` (raised while opening the realtime
 * sink) are fatal. `FetchError` and `TimeoutError` are caught by the crawl
 * task and turned into broken-link records.
 *
 * @example
 * ```ts
 * import { TimeoutError, formatError } from "./utils/errors.js";
 *
 * formatError(new TimeoutError("Request to https://example.com timed out after 10000ms"));
 * // => "[TIMEOUT] Request to https://example.com timed out after 10000ms"
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error Class
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Base error class for all link-checker errors.
 *
 * Subclasses get a {@link code}, can be caught with
 * `instanceof LinkCheckerError`, and report their own class in `name`.
 */
export class LinkCheckerError extends Error {
  /**
   * Machine-readable error code in SCREAMING_SNAKE_CASE.
   *
   * @example "FETCH_FAILED", "TIMEOUT"
   */
  public readonly code: string;

  /**
   * @param message - Human-readable description of what went wrong.
   * @param code    - Stable machine-readable error code.
   */
  constructor(message: string, code: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Concrete Error Subclasses
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Thrown when a request could not produce an HTTP response.
 *
 * Covers DNS resolution, TCP connect, TLS handshake and protocol failures,
 * as well as URLs that cannot be requested at all (unparseable, or with a
 * scheme other than http/https). An HTTP error status is NOT a FetchError:
 * the crawler classifies it as an outcome.
 *
 * @example
 * ```ts
 * throw new FetchError("Failed to fetch https://example.invalid: getaddrinfo ENOTFOUND example.invalid");
 * ```
 */
export class FetchError extends LinkCheckerError {
  constructor(message: string) {
    super(message, "FETCH_FAILED");
  }
}

/**
 * Thrown when a single request exceeds its time budget.
 *
 * @example
 * ```ts
 * throw new TimeoutError("Request to https://slow.example.com timed out after 10000ms");
 * ```
 */
export class TimeoutError extends LinkCheckerError {
  constructor(message: string) {
    super(message, "TIMEOUT");
  }
}

/**
 * Thrown when the command line or environment yields an unusable
 * configuration: a missing or malformed base URL, or a non-integer or
 * out-of-range depth, concurrency or timeout.
 *
 * Always raised before any crawling begins.
 */
export class ConfigError extends LinkCheckerError {
  /**
   * One line per offending option, e.g. `"--depth: Expected integer"`.
   */
  public readonly issues: string[];

  /**
   * @param message - Summary of the problem.
   * @param issues  - Individual problems, one per option.
   */
  constructor(message: string, issues: string[] = []) {
    super(message, "INVALID_CONFIG");
    this.issues = issues;
  }
}

/**
 * Thrown when an export file cannot be opened or written.
 *
 * @example
 * ```ts
 * throw new ExportError("Cannot open realtime export live.csv: EACCES: permission denied");
 * ```
 */
export class ExportError extends LinkCheckerError {
  /** Path of the export file involved. */
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message, "EXPORT_FAILED");
    this.path = path;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Convert any caught value to a single-line description.
 *
 * - {@link LinkCheckerError} subclasses: `"[CODE] message"`.
 * - Other `Error` instances: `.message`, followed by the message of a
 *   `cause` when one is attached (undici reports the real network failure,
 *   e.g. `ECONNREFUSED`, only in `cause`).
 * - Everything else: `String(value)`.
 *
 * @example
 * ```ts
 * formatError(new FetchError("Connection refused"));
 * // => "[FETCH_FAILED] Connection refused"
 *
 * formatError(new TypeError("fetch failed", { cause: new Error("connect ECONNREFUSED 127.0.0.1:80") }));
 * // => "fetch failed (connect ECONNREFUSED 127.0.0.1:80)"
 *
 * formatError("something went wrong");
 * // => "something went wrong"
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof LinkCheckerError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    if (error.cause instanceof Error && error.cause.message) {
      return `${error.message} (${error.cause.message})`;
    }
    return error.message;
  }

  return String(error);
}
