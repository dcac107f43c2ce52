/**
 * @module crawler/crawl-state
 * @fileoverview The single owned state object of one crawl run.
 *
 * Holds the visited set, the discovered set, the status histogram and the
 * broken-link list. Tasks never touch these containers directly; they go
 * through the operations below.
 *
 * ## Atomicity
 * Every mutating operation is a synchronous method. Tasks run on one event
 * loop and only yield at `await` points, so a call such as
 * {@link CrawlState.tryMarkVisited} completes its check-and-insert before any
 * other task can observe the set. That is the mutual exclusion the crawler
 * relies on: of any number of concurrent callers marking the same URL,
 * exactly one gets `true`.
 *
 * {@link CrawlState.recordBroken} appends synchronously and only then awaits
 * the optional realtime sink, which serializes its own writes.
 */

import type { BrokenLinkRecord, BrokenOutcome, HistogramKey } from "./types.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Destination that receives each broken link the moment it is recorded.
 * Implemented by `RealtimeExporter`.
 */
export interface BrokenLinkSink {
  write(record: BrokenLinkRecord): Promise<void>;
}

/** Point-in-time counters, used for progress rendering. */
export interface CrawlSnapshot {
  /** URLs ever enqueued. */
  discovered: number;
  /** URLs dispatched for fetching. */
  checked: number;
  /** Discovered but not (yet) visited. */
  inQueue: number;
  /** Broken links recorded so far. */
  broken: number;
  /** Copy of the status histogram. */
  histogram: Map<HistogramKey, number>;
}

/* ────────────────────────────────────────────────────────────────────────────
 * CrawlState
 * ──────────────────────────────────────────────────────────────────────────── */

export class CrawlState {
  private readonly visited = new Set<string>();
  private readonly discovered = new Set<string>();
  private readonly histogram = new Map<HistogramKey, number>();
  private readonly broken: BrokenLinkRecord[] = [];

  /**
   * @param sink - Optional realtime destination for broken links.
   */
  constructor(private readonly sink?: BrokenLinkSink) {}

  /**
   * Record `url` as visited unless it already is.
   *
   * @returns `true` iff this call inserted the URL. Callers fetch only then.
   */
  tryMarkVisited(url: string): boolean {
    if (this.visited.has(url)) {
      return false;
    }
    this.visited.add(url);
    return true;
  }

  /**
   * Record `url` as discovered unless it already is.
   *
   * @returns `true` iff this call inserted the URL. Callers enqueue only then.
   */
  tryMarkDiscovered(url: string): boolean {
    if (this.discovered.has(url)) {
      return false;
    }
    this.discovered.add(url);
    return true;
  }

  /** Increment the histogram entry for an HTTP status or `"error"`. */
  recordStatus(key: HistogramKey): void {
    this.histogram.set(key, (this.histogram.get(key) ?? 0) + 1);
  }

  /**
   * Append a broken link and forward it to the realtime sink, if any.
   *
   * The record is in {@link brokenLinks} before the returned promise settles,
   * even if the sink write fails.
   */
  async recordBroken(url: string, outcome: BrokenOutcome, sourceUrl: string): Promise<void> {
    const record: BrokenLinkRecord = { url, outcome, sourceUrl };
    this.broken.push(record);

    if (this.sink) {
      await this.sink.write(record);
    }
  }

  /** Count for one histogram key (0 when never recorded). */
  statusCount(key: HistogramKey): number {
    return this.histogram.get(key) ?? 0;
  }

  /**
   * Current counters. The histogram is a copy.
   *
   * `inQueue` is a size difference: a URL is always marked discovered before
   * it can be marked visited.
   */
  snapshot(): CrawlSnapshot {
    return {
      discovered: this.discovered.size,
      checked: this.visited.size,
      inQueue: this.discovered.size - this.visited.size,
      broken: this.broken.length,
      histogram: new Map(this.histogram),
    };
  }

  /** Copy of the broken-link list in completion order. */
  brokenLinks(): BrokenLinkRecord[] {
    return [...this.broken];
  }

  /** Copy of the visited set. */
  visitedUrls(): Set<string> {
    return new Set(this.visited);
  }

  /** Copy of the discovered set. */
  discoveredUrls(): Set<string> {
    return new Set(this.discovered);
  }

  /** Copy of the histogram. */
  statusHistogram(): Map<HistogramKey, number> {
    return new Map(this.histogram);
  }
}
