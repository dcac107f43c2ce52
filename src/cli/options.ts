/**
 * @module cli/options
 * @fileoverview Command-line parsing and validation.
 *
 * `node:util`'s `parseArgs` splits argv into raw strings; the zod schema
 * coerces and range-checks them and applies defaults from {@link AppConfig}.
 * Every problem surfaces as a single {@link ConfigError} listing each
 * offending flag, before any crawling starts.
 *
 * ## Flags
 * | Flag                      | Meaning                                   | Default            |
 * |---------------------------|-------------------------------------------|--------------------|
 * | `-u, --url <url>`         | Base URL to start crawling from           | required           |
 * | `-d, --depth <n>`         | Maximum crawl depth                       | `MAX_DEPTH` or 5   |
 * | `-t, --threads <n>`       | Concurrent requests (`--concurrency`)     | `MAX_CONCURRENT` or 10 |
 * | `-e, --export <file>`     | CSV of broken links, written after scan   | off                |
 * | `--export-realtime <file>`| CSV of broken links, written as found     | off                |
 * | `--export-status <codes>` | Status codes kept in `--export`           | all >= 400         |
 * | `--timeout <ms>`          | Per-request timeout                       | `FETCH_TIMEOUT` or 10000 |
 * | `--no-progress`           | Disable the live progress line            | progress on        |
 * | `-h, --help`              | Print usage                               |                    |
 */

import { parseArgs } from "node:util";
import { z } from "zod";
import { config as defaultConfig, type AppConfig } from "../config.js";
import { ConfigError } from "../utils/errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/** Validated settings for one run. */
export interface CliOptions {
  /** Base URL as given (normalized later by the crawler). */
  url: string;
  maxDepth: number;
  concurrency: number;
  /** Per-request timeout in milliseconds. */
  timeoutMs: number;
  /** End-of-run CSV path. */
  exportPath?: string;
  /** Realtime CSV path. */
  realtimeExportPath?: string;
  /** Status codes kept in the end-of-run export; all when absent. */
  exportStatusCodes?: number[];
  /** Whether to print the live progress line. */
  progress: boolean;
}

/** What the command line asks for. */
export type CliCommand = { kind: "help" } | { kind: "run"; options: CliOptions };

/* ────────────────────────────────────────────────────────────────────────────
 * Usage
 * ──────────────────────────────────────────────────────────────────────────── */

export const USAGE = `Usage: link-checker -u <url> [options]

Crawl a website's internal links and report broken ones.

Options:
  -u, --url <url>             Base URL to start crawling from (required)
  -d, --depth <n>             Maximum crawl depth (default: 5)
  -t, --threads <n>           Number of concurrent requests (default: 10)
      --concurrency <n>       Alias for --threads
  -e, --export <file>         Export broken links to CSV file after scan
      --export-realtime <file>
                              Export broken links to CSV file in real time
      --export-status <codes> Comma-separated status codes kept in --export
                              (e.g. 400,404,500; default: every status >= 400)
      --timeout <ms>          Per-request timeout in milliseconds (default: 10000)
      --no-progress           Do not print live progress
  -h, --help                  Show this help`;

/* ────────────────────────────────────────────────────────────────────────────
 * Schema
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * zod schema over the raw flag strings, keyed by long flag name so that
 * issue paths read as flags.
 */
export function createCliSchema(appConfig: AppConfig) {
  // Digits only: Number("") and Number(" ") are 0.
  const integer = (min: number, fallback: number) =>
    z
      .string()
      .trim()
      .regex(/^-?\d+$/, "Expected an integer")
      .pipe(z.coerce.number().int("Expected an integer").min(min, `Must be at least ${min}`))
      .optional()
      .transform((value) => value ?? fallback);

  return z.object({
    url: z
      .string({ required_error: "A base URL is required" })
      .trim()
      .url("Expected an absolute URL")
      .refine((value) => /^https?:\/\//i.test(value), "Only http:// and https:// URLs can be crawled"),
    depth: integer(0, appConfig.defaultMaxDepth),
    threads: integer(1, appConfig.defaultConcurrency),
    timeout: integer(1, appConfig.fetchTimeout),
    export: z.string().min(1, "Expected a file path").optional(),
    "export-realtime": z.string().min(1, "Expected a file path").optional(),
    "export-status": z
      .string()
      .transform((value) =>
        value
          .split(",")
          .map((part) => part.trim())
          .filter((part) => part.length > 0),
      )
      .pipe(
        z
          .array(
            z.coerce
              .number()
              .int("Expected integer status codes")
              .min(400, "Status codes must be between 400 and 599")
              .max(599, "Status codes must be between 400 and 599"),
          )
          .nonempty("Expected at least one status code"),
      )
      .optional(),
    progress: z.boolean(),
  });
}

/* ────────────────────────────────────────────────────────────────────────────
 * Parsing
 * ──────────────────────────────────────────────────────────────────────────── */

function splitArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        url: { type: "string", short: "u" },
        depth: { type: "string", short: "d" },
        threads: { type: "string", short: "t" },
        concurrency: { type: "string" },
        export: { type: "string", short: "e" },
        "export-realtime": { type: "string" },
        "export-status": { type: "string" },
        timeout: { type: "string" },
        "no-progress": { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(message, [message]);
  }
}

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @param argv - e.g. `process.argv.slice(2)`.
 * @param appConfig - Source of defaults; the loaded {@link defaultConfig} when omitted.
 * @throws {ConfigError} On unknown flags, missing values, or invalid values.
 *
 * @example
 * ```ts
 * parseCliArgs(["-u", "https://example.com", "-d", "2"]);
 * // => { kind: "run", options: { url: "https://example.com", maxDepth: 2,
 * //      concurrency: 10, timeoutMs: 10000, progress: true } }
 * ```
 */
export function parseCliArgs(argv: string[], appConfig: AppConfig = defaultConfig): CliCommand {
  const values = splitArgv(argv);

  if (values.help) {
    return { kind: "help" };
  }

  const parsed = createCliSchema(appConfig).safeParse({
    url: values.url,
    depth: values.depth,
    threads: values.threads ?? values.concurrency,
    timeout: values.timeout,
    export: values.export,
    "export-realtime": values["export-realtime"],
    "export-status": values["export-status"],
    progress: !values["no-progress"],
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `--${String(issue.path[0])}: ${issue.message}`);
    throw new ConfigError(`Invalid arguments:\n  ${issues.join("\n  ")}`, issues);
  }

  const data = parsed.data;
  const options: CliOptions = {
    url: data.url,
    maxDepth: data.depth,
    concurrency: data.threads,
    timeoutMs: data.timeout,
    progress: data.progress,
  };
  if (data.export !== undefined) {
    options.exportPath = data.export;
  }
  if (data["export-realtime"] !== undefined) {
    options.realtimeExportPath = data["export-realtime"];
  }
  if (data["export-status"] !== undefined) {
    options.exportStatusCodes = data["export-status"];
  }

  return { kind: "run", options };
}
