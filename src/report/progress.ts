/**
 * @module report/progress
 * @fileoverview Live one-line progress while the crawl runs.
 *
 * On a terminal the line is redrawn in place (`\r`); on a pipe or file each
 * update is its own line. Updates closer together than the interval are
 * dropped, except the last one, which {@link ProgressReporter.finish} always
 * prints.
 */

import type { CrawlSnapshot } from "../crawler/crawl-state.js";
import { TRANSPORT_ERROR_KEY } from "../crawler/types.js";

/** Minimal writable surface; `process.stderr` satisfies it. */
export interface ProgressStream {
  write(chunk: string): boolean;
  isTTY?: boolean;
}

/**
 * Compact progress line.
 *
 * @example
 * ```ts
 * formatProgressLine(snapshot);
 * // => "🔁 discovered 12 | checked 8 | queued 4 | 200: 7 | 404: 1 | errors: 0 | broken: 1"
 * ```
 */
export function formatProgressLine(snapshot: CrawlSnapshot): string {
  const status = (key: number): number => snapshot.histogram.get(key) ?? 0;
  return [
    `🔁 discovered ${snapshot.discovered}`,
    `checked ${snapshot.checked}`,
    `queued ${snapshot.inQueue}`,
    `200: ${status(200)}`,
    `404: ${status(404)}`,
    `errors: ${snapshot.histogram.get(TRANSPORT_ERROR_KEY) ?? 0}`,
    `broken: ${snapshot.broken}`,
  ].join(" | ");
}

export class ProgressReporter {
  private lastPrintedAt = Number.NEGATIVE_INFINITY;
  private latest: CrawlSnapshot | undefined;
  private latestPrinted = false;

  /**
   * @param stream - Destination, usually `process.stderr`.
   * @param intervalMs - Minimum spacing between printed updates.
   * @param now - Clock, replaceable in tests.
   */
  constructor(
    private readonly stream: ProgressStream,
    private readonly intervalMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /** Record a snapshot; print it unless the previous print is too recent. */
  update(snapshot: CrawlSnapshot): void {
    this.latest = snapshot;
    this.latestPrinted = false;

    const now = this.now();
    if (now - this.lastPrintedAt >= this.intervalMs) {
      this.lastPrintedAt = now;
      this.print(snapshot);
    }
  }

  /** Print the last snapshot if it was throttled, and end the line. */
  finish(): void {
    if (this.latest && !this.latestPrinted) {
      this.print(this.latest);
    }
    if (this.stream.isTTY && this.latest) {
      this.stream.write("\n");
    }
  }

  private print(snapshot: CrawlSnapshot): void {
    this.latestPrinted = true;
    const line = formatProgressLine(snapshot);
    if (this.stream.isTTY) {
      this.stream.write(`\r\x1b[2K${line}`);
    } else {
      this.stream.write(`${line}\n`);
    }
  }
}
