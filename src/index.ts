#!/usr/bin/env node
/**
 * @module index
 * @fileoverview link-checker entry point.
 *
 * Crawls the internal links of a website and reports the broken ones.
 *
 * ```
 * link-checker -u https://example.com --export broken.csv
 * link-checker -u https://example.com --export-realtime live_broken.csv
 * ```
 *
 * ## Architecture
 * ```
 * index.ts (this file)
 *   |
 *   v
 * cli/run.ts
 *   +-- cli/options.ts            (argv -> validated options)
 *   +-- export/realtime-exporter  (CSV rows as links break)
 *   +-- crawler/bfs-crawler.ts    (waves over a bounded worker pool)
 *   |     +-- crawler/fetch-task.ts --> services/fetch.ts
 *   |                               --> crawler/link-resolver.ts
 *   +-- report/summary.ts         (statistics and broken-link tables)
 *   +-- export/csv.ts             (end-of-run CSV)
 * ```
 *
 * ## Environment Variables
 * See {@link config} for all supported variables: `MAX_DEPTH`,
 * `MAX_CONCURRENT`, `FETCH_TIMEOUT`, `MAX_RESPONSE_SIZE`, `USER_AGENT`,
 * `PROGRESS_INTERVAL`, `LOG_LEVEL`.
 */

import { runCli } from "./cli/run.js";

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
