/**
 * @fileoverview Bounded concurrency for the crawl engine.
 *
 * Two queues are built on p-queue here:
 *
 * ```
 *   frontier wave (any size)
 *         |
 *         v
 *   [ WorkerPool ]      <-- N concurrent (default 10)
 *         |                  excess tasks wait for a free slot
 *         v
 *   fetch-and-extract task
 *         |
 *         v
 *   [ SerialQueue ]     <-- 1 concurrent
 *         |                  one export write at a time
 *         v
 *   realtime CSV file
 * ```
 *
 * The pool is the crawl's only admission control: at most N fetches are in
 * flight, however many entries a wave holds. There is no per-domain interval.
 *
 * @module services/queue
 */

import PQueue from "p-queue";
import { config } from "../config.js";

// ---------------------------------------------------------------------------
// WorkerPool
// ---------------------------------------------------------------------------

/**
 * Runs submitted tasks with at most `concurrency` of them active at once.
 *
 * ## Usage
 *
 * ```typescript
 * const pool = new WorkerPool(10);
 *
 * const results = await Promise.all(
 *   urls.map((url) => pool.submit(() => checkUrl(url))),
 * );
 * ```
 */
export class WorkerPool {
  private readonly queue: PQueue;

  /**
   * @param concurrency - Maximum number of simultaneously running tasks.
   *   Defaults to `config.defaultConcurrency`.
   */
  constructor(concurrency?: number) {
    this.queue = new PQueue({
      concurrency: concurrency ?? config.defaultConcurrency,
    });
  }

  /**
   * Queue a task and resolve with its result once it has run.
   *
   * Rejections from `fn` are passed through unchanged.
   *
   * @typeParam T - The task's result type.
   */
  submit<T>(fn: () => Promise<T>): Promise<T> {
    // throwOnTimeout narrows the result to T; no timeout is configured.
    return this.queue.add(fn, { throwOnTimeout: true });
  }

  /** Maximum number of simultaneously running tasks. */
  get concurrency(): number {
    return this.queue.concurrency;
  }

  /** Resolves once no task is running or waiting. */
  async drain(): Promise<void> {
    await this.queue.onIdle();
  }
}

// ---------------------------------------------------------------------------
// SerialQueue
// ---------------------------------------------------------------------------

/**
 * A {@link WorkerPool} of one: tasks run strictly one after another, in
 * submission order. Used as the exclusion mechanism around a shared file.
 *
 * @example
 * ```typescript
 * const writes = new SerialQueue();
 * await Promise.all([
 *   writes.submit(() => handle.write("a\n")),
 *   writes.submit(() => handle.write("b\n")),
 * ]); // "a\n" is fully written before "b\n" starts
 * ```
 */
export class SerialQueue extends WorkerPool {
  constructor() {
    super(1);
  }
}
