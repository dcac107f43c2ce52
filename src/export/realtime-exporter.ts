/**
 * @module export/realtime-exporter
 * @fileoverview Append-only CSV sink that receives each broken link while the
 * crawl is still running.
 *
 * - The header is written and synced when the file is opened, before any
 *   data row.
 * - Every {@link RealtimeExporter.write} appends one row and `fsync`s the
 *   file before resolving, so rows already reported survive a crash.
 * - Writes pass through a {@link SerialQueue}, so two tasks that find broken
 *   links at the same moment never interleave partial rows.
 *
 * @example
 * ```ts
 * const exporter = await RealtimeExporter.open("live_broken.csv");
 * try {
 *   await crawl(baseUrl, { sink: exporter });
 * } finally {
 *   await exporter.close();
 * }
 * ```
 */

import { open, type FileHandle } from "node:fs/promises";
import type { BrokenLinkSink } from "../crawler/crawl-state.js";
import type { BrokenLinkRecord } from "../crawler/types.js";
import { SerialQueue } from "../services/queue.js";
import { ExportError, formatError } from "../utils/errors.js";
import { csvHeaderLine, formatCsvRow } from "./csv.js";

export class RealtimeExporter implements BrokenLinkSink {
  private readonly writes = new SerialQueue();
  private closed = false;

  private constructor(
    private readonly handle: FileHandle,
    /** Path of the export file. */
    public readonly path: string,
  ) {}

  /**
   * Create (or truncate) `path` and write the header.
   *
   * @throws {ExportError} If the file cannot be opened or the header written.
   *   This is fatal for the run: it happens before crawling starts.
   */
  static async open(path: string): Promise<RealtimeExporter> {
    let handle: FileHandle;
    try {
      handle = await open(path, "w");
    } catch (error: unknown) {
      throw new ExportError(`Cannot open realtime export ${path}: ${formatError(error)}`, path);
    }

    const exporter = new RealtimeExporter(handle, path);
    try {
      await exporter.append(csvHeaderLine());
    } catch (error: unknown) {
      await handle.close();
      throw new ExportError(`Cannot write realtime export ${path}: ${formatError(error)}`, path);
    }
    return exporter;
  }

  /**
   * Append one record and sync it to disk.
   *
   * @throws {ExportError} If the exporter is closed or the write fails.
   */
  async write(record: BrokenLinkRecord): Promise<void> {
    if (this.closed) {
      throw new ExportError(`Realtime export ${this.path} is closed`, this.path);
    }

    try {
      await this.writes.submit(() => this.append(formatCsvRow(record)));
    } catch (error: unknown) {
      throw new ExportError(`Cannot write realtime export ${this.path}: ${formatError(error)}`, this.path);
    }
  }

  /**
   * Wait for queued writes, then close the file. Calling it twice is a no-op.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.writes.drain();
    await this.handle.close();
  }

  private async append(line: string): Promise<void> {
    await this.handle.write(line, null, "utf-8");
    await this.handle.sync();
  }
}
