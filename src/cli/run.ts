/**
 * @module cli/run
 * @fileoverview The link-checker command: parse flags, crawl, report, export.
 *
 * ## Flow
 * 1. Parse and validate argv ({@link parseCliArgs}). Invalid input prints the
 *    problem plus usage and exits 1 before any request is made.
 * 2. Open the realtime export, if requested. Failure to open it is fatal.
 * 3. Crawl, with the live progress line on stderr.
 * 4. Close the realtime export, print statistics and the broken-link summary.
 * 5. Write the end-of-run export, if requested.
 *
 * Broken links are a normal result: the exit code is 0 whenever the crawl
 * ran to completion.
 */

import { parseCliArgs, USAGE, type CliCommand } from "./options.js";
import { crawl, type CrawlResult } from "../crawler/bfs-crawler.js";
import type { CrawlSnapshot } from "../crawler/crawl-state.js";
import { exportBrokenLinks } from "../export/csv.js";
import { RealtimeExporter } from "../export/realtime-exporter.js";
import { ProgressReporter, type ProgressStream } from "../report/progress.js";
import {
  formatRunSummary,
  renderBrokenLinksSummary,
  renderStatsTable,
} from "../report/summary.js";
import { HttpPageFetcher, type PageFetcher } from "../services/fetch.js";
import { config as defaultConfig, type AppConfig } from "../config.js";
import { ConfigError, ExportError, formatError } from "../utils/errors.js";
import { normalizeUrl } from "../utils/url.js";

/** Process surroundings of the command, replaceable in tests. */
export interface CliEnvironment {
  stdout?: ProgressStream;
  stderr?: ProgressStream;
  /** Defaults and settings; {@link defaultConfig} when omitted. */
  appConfig?: AppConfig;
  /**
   * Source of HTTP responses. When omitted an {@link HttpPageFetcher} is
   * built from the parsed `--timeout`.
   */
  fetcher?: PageFetcher;
}

function toSnapshot(result: CrawlResult): CrawlSnapshot {
  return {
    discovered: result.discovered.size,
    checked: result.visited.size,
    inQueue: result.discovered.size - result.visited.size,
    broken: result.broken.length,
    histogram: result.histogram,
  };
}

/**
 * Run the command with `argv` (flags only) and resolve with the exit code.
 *
 * @example
 * ```ts
 * const code = await runCli(["-u", "https://example.com", "-e", "broken.csv"]);
 * process.exitCode = code;
 * ```
 */
export async function runCli(argv: string[], env: CliEnvironment = {}): Promise<number> {
  const stdout = env.stdout ?? process.stdout;
  const stderr = env.stderr ?? process.stderr;
  const appConfig = env.appConfig ?? defaultConfig;
  const print = (text: string): void => {
    stdout.write(`${text}\n`);
  };

  // ── 1. Arguments ──
  let command: CliCommand;
  try {
    command = parseCliArgs(argv, appConfig);
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      stderr.write(`${error.message}\n\n${USAGE}\n`);
      return 1;
    }
    throw error;
  }

  if (command.kind === "help") {
    print(USAGE);
    return 0;
  }

  const options = command.options;
  const baseUrl = normalizeUrl(options.url, "");
  print(
    `🌐 Scanning ${baseUrl} up to depth ${options.maxDepth} with ${options.concurrency} threads\n`,
  );

  // ── 2. Realtime export ──
  let exporter: RealtimeExporter | undefined;
  if (options.realtimeExportPath !== undefined) {
    try {
      exporter = await RealtimeExporter.open(options.realtimeExportPath);
    } catch (error: unknown) {
      stderr.write(`${formatError(error)}\n`);
      return 1;
    }
  }

  // ── 3. Crawl ──
  const progress = options.progress
    ? new ProgressReporter(stderr, appConfig.progressInterval)
    : undefined;

  let result: CrawlResult;
  try {
    result = await crawl(baseUrl, {
      maxDepth: options.maxDepth,
      concurrency: options.concurrency,
      fetcher:
        env.fetcher ??
        new HttpPageFetcher({
          timeoutMs: options.timeoutMs,
          maxResponseSize: appConfig.maxResponseSize,
          userAgent: appConfig.userAgent,
        }),
      sink: exporter,
      onProgress: (snapshot) => progress?.update(snapshot),
    });
  } finally {
    progress?.finish();
    await exporter?.close();
  }

  // ── 4. Report ──
  print("\n✅ Scan complete");
  print(formatRunSummary(result.summary));
  print(renderStatsTable(toSnapshot(result)));
  print(renderBrokenLinksSummary(result.broken));

  if (exporter) {
    print(`💾 Streamed broken links to ${exporter.path}`);
  }

  // ── 5. Final export ──
  if (options.exportPath !== undefined) {
    try {
      await exportBrokenLinks(options.exportPath, result.broken, {
        statusCodes: options.exportStatusCodes,
      });
    } catch (error: unknown) {
      if (error instanceof ExportError) {
        stderr.write(`${formatError(error)}\n`);
        return 1;
      }
      throw error;
    }
    print(`💾 Exported broken links to ${options.exportPath}`);
  }

  return 0;
}
