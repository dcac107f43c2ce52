/**
 * @module crawler/bfs-crawler
 * @fileoverview Breadth-first crawl scheduler with a bounded worker pool.
 *
 * ## Algorithm Overview
 *
 * ```
 *   Start URL (depth 0, source "root")
 *      |
 *      v
 *   [Frontier] --drain into wave--> [WorkerPool: N tasks in flight]
 *      ^                                   |
 *      |                                   v
 *      |                          [fetchAndExtract] --> CrawlState
 *      |                                   |               |
 *      +------- new entries (any order) ---+               +--> realtime sink
 *      |
 *      +-- (empty after a wave) --> [DONE]
 * ```
 *
 * Each wave takes the whole frontier at once (the frontier is emptied before
 * any result of the wave is merged back), submits every entry to the pool,
 * and appends the entries returned by each task as it completes. When every
 * task of the wave has settled, a non-empty frontier starts the next wave;
 * an empty one ends the crawl.
 *
 * Waves are not what prevents double fetching: an entry can only be fetched
 * by the task whose `tryMarkVisited` call won, wherever that entry sat.
 *
 * ## Error Handling Strategy
 * Fetch failures are turned into broken-link records inside the task. A task
 * that rejects for any other reason (a failing realtime export write, for
 * instance) is logged and counts as having found no links. Nothing aborts
 * the crawl once it has started.
 *
 * ## Architecture Position
 * ```
 *   cli/run  -->  bfs-crawler  (this file)
 *                     |
 *                     +-->  services/queue   (WorkerPool)
 *                     +-->  fetch-task       (one entry)
 *                     +-->  crawl-state      (dedup, histogram, broken list)
 *                     +-->  services/fetch   (default PageFetcher)
 * ```
 *
 * @example
 * ```ts
 * import { crawl } from "./bfs-crawler.js";
 *
 * const result = await crawl("https://example.com", { maxDepth: 2, concurrency: 5 });
 * console.log(result.summary);
 * // { pagesChecked: 4, linksDiscovered: 4, brokenLinks: 1, waves: 3,
 * //   maxDepthReached: 2, durationMs: 812 }
 * ```
 */

import { CrawlState, type BrokenLinkSink, type CrawlSnapshot } from "./crawl-state.js";
import { fetchAndExtract, type TaskContext } from "./fetch-task.js";
import {
  ROOT_SOURCE,
  type BrokenLinkRecord,
  type FrontierEntry,
  type HistogramKey,
} from "./types.js";
import { HttpPageFetcher, type PageFetcher } from "../services/fetch.js";
import { WorkerPool } from "../services/queue.js";
import { config } from "../config.js";
import { formatError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { normalizeUrl } from "../utils/url.js";

const log = createLogger("bfs-crawler");

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Options for one crawl run. Omitted fields fall back to {@link config}.
 */
export interface CrawlOptions {
  /**
   * Entries deeper than this are discovered but never fetched.
   *
   * @default config.defaultMaxDepth (5)
   */
  maxDepth?: number;

  /**
   * Maximum number of fetches in flight.
   *
   * @default config.defaultConcurrency (10)
   */
  concurrency?: number;

  /**
   * Source of HTTP responses.
   *
   * @default a new HttpPageFetcher using config.fetchTimeout
   */
  fetcher?: PageFetcher;

  /** Receives each broken link as soon as it is recorded. */
  sink?: BrokenLinkSink;

  /** Called after every completed task with the current counters. */
  onProgress?: (snapshot: CrawlSnapshot) => void;
}

/** Counters describing how a crawl run went. */
export interface CrawlSummary {
  /** `visited.size` */
  pagesChecked: number;
  /** `discovered.size` */
  linksDiscovered: number;
  /** `broken.length` */
  brokenLinks: number;
  /** Number of dispatch waves run. */
  waves: number;
  /** Deepest level at which an entry was dispatched within the limit. */
  maxDepthReached: number;
  /** Wall-clock duration of the crawl. */
  durationMs: number;
}

/** Final state of a crawl run. */
export interface CrawlResult {
  /** Normalized start URL. */
  baseUrl: string;

  /** Every URL that was fetched (or attempted). */
  visited: Set<string>;

  /**
   * Every URL ever enqueued, including those beyond the depth limit that
   * were never fetched.
   */
  discovered: Set<string>;

  /** Status code (or `"error"`) to count. */
  histogram: Map<HistogramKey, number>;

  /** Broken links in task completion order. */
  broken: BrokenLinkRecord[];

  summary: CrawlSummary;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Main Crawl Function
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Crawl `startUrl` and everything internal reachable from it within the
 * depth limit, checking each URL once.
 *
 * Resolves when the frontier is empty; never rejects because of a page.
 *
 * @param startUrl - Absolute http(s) URL. It is normalized first, and that
 *   normalized form decides which links count as internal.
 */
export async function crawl(startUrl: string, options: CrawlOptions = {}): Promise<CrawlResult> {
  const startedAt = Date.now();

  const baseUrl = normalizeUrl(startUrl, "");
  const state = new CrawlState(options.sink);
  const pool = new WorkerPool(options.concurrency ?? config.defaultConcurrency);

  const context: TaskContext = {
    baseUrl,
    maxDepth: options.maxDepth ?? config.defaultMaxDepth,
    state,
    fetcher: options.fetcher ?? new HttpPageFetcher(),
  };

  // ── Init ──
  const frontier: FrontierEntry[] = [{ url: baseUrl, depth: 0, sourceUrl: ROOT_SOURCE }];
  state.tryMarkDiscovered(baseUrl);

  let waves = 0;
  let maxDepthReached = 0;

  const runTask = async (entry: FrontierEntry): Promise<FrontierEntry[]> => {
    try {
      return await fetchAndExtract(entry, context);
    } catch (error: unknown) {
      log.error(`Task for ${entry.url} failed: ${formatError(error)}`);
      return [];
    }
  };

  // ── Waves ──
  while (frontier.length > 0) {
    const wave = frontier.splice(0, frontier.length);
    waves++;
    log.debug(`Wave ${waves}: dispatching ${wave.length} entries to ${pool.concurrency} workers`);

    for (const entry of wave) {
      if (entry.depth <= context.maxDepth && entry.depth > maxDepthReached) {
        maxDepthReached = entry.depth;
      }
    }

    await Promise.all(
      wave.map((entry) =>
        pool.submit(() => runTask(entry)).then((next) => {
          frontier.push(...next);
          options.onProgress?.(state.snapshot());
        }),
      ),
    );
  }

  // ── Done ──
  const visited = state.visitedUrls();
  const discovered = state.discoveredUrls();
  const broken = state.brokenLinks();

  return {
    baseUrl,
    visited,
    discovered,
    histogram: state.statusHistogram(),
    broken,
    summary: {
      pagesChecked: visited.size,
      linksDiscovered: discovered.size,
      brokenLinks: broken.length,
      waves,
      maxDepthReached,
      durationMs: Date.now() - startedAt,
    },
  };
}
