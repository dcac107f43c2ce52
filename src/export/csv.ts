/**
 * @module export/csv
 * @fileoverview CSV encoding of broken-link records and the end-of-run export.
 *
 * Both exports (realtime and final) share the header `Error,URL,Source` and
 * the row format produced by {@link formatCsvRow}:
 *
 * | Column | Value |
 * |--------|-------|
 * | Error  | HTTP status (`404`) or the literal `ERROR` for transport failures |
 * | URL    | normalized broken target |
 * | Source | normalized referring page, or `root` |
 */

import { writeFile } from "node:fs/promises";
import type { BrokenLinkRecord, BrokenOutcome } from "../crawler/types.js";
import { ExportError, formatError } from "../utils/errors.js";

/** Column names, in order. */
export const CSV_HEADER = ["Error", "URL", "Source"] as const;

/** `Error` cell value for transport failures. */
export const TRANSPORT_ERROR_CELL = "ERROR";

/**
 * Quote a field when it contains a comma, a double quote, or a line break;
 * inner quotes are doubled.
 *
 * @example
 * ```ts
 * escapeCsvField("https://example.com/a?x=1,2"); // => "\"https://example.com/a?x=1,2\""
 * escapeCsvField("plain");                       // => "plain"
 * ```
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** One CSV line (with trailing `\n`) from raw field values. */
export function toCsvLine(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(",") + "\n";
}

/** The header line, `Error,URL,Source\n`. */
export function csvHeaderLine(): string {
  return toCsvLine(CSV_HEADER);
}

/** `Error` cell for an outcome: the status code, or `ERROR`. */
export function errorCell(outcome: BrokenOutcome): string {
  return outcome.kind === "http_error" ? String(outcome.status) : TRANSPORT_ERROR_CELL;
}

/**
 * Encode a record as one CSV line.
 *
 * @example
 * ```ts
 * formatCsvRow({
 *   url: "https://example.com/b",
 *   outcome: { kind: "http_error", status: 404 },
 *   sourceUrl: "https://example.com",
 * });
 * // => "404,https://example.com/b,https://example.com\n"
 * ```
 */
export function formatCsvRow(record: BrokenLinkRecord): string {
  return toCsvLine([errorCell(record.outcome), record.url, record.sourceUrl]);
}

/**
 * Which records the end-of-run export keeps.
 *
 * Without `statusCodes`, every record is exported, the same set the realtime
 * export receives. With `statusCodes`, HTTP errors are limited to those
 * codes; transport errors are always kept.
 */
export interface ExportFilter {
  statusCodes?: readonly number[];
}

/** Whether `record` passes `filter`. */
export function matchesExportFilter(record: BrokenLinkRecord, filter: ExportFilter): boolean {
  if (record.outcome.kind === "transport_error" || !filter.statusCodes) {
    return true;
  }
  return filter.statusCodes.includes(record.outcome.status);
}

/** Full CSV document (header plus matching rows). */
export function renderCsv(records: readonly BrokenLinkRecord[], filter: ExportFilter = {}): string {
  const rows = records
    .filter((record) => matchesExportFilter(record, filter))
    .map(formatCsvRow);
  return csvHeaderLine() + rows.join("");
}

/**
 * Write the end-of-run export, replacing any existing file at `path`.
 *
 * @returns Number of data rows written.
 * @throws {ExportError} If the file cannot be written.
 */
export async function exportBrokenLinks(
  path: string,
  records: readonly BrokenLinkRecord[],
  filter: ExportFilter = {},
): Promise<number> {
  const rowCount = records.filter((record) => matchesExportFilter(record, filter)).length;

  try {
    await writeFile(path, renderCsv(records, filter), { encoding: "utf-8" });
  } catch (error: unknown) {
    throw new ExportError(`Cannot write export ${path}: ${formatError(error)}`, path);
  }

  return rowCount;
}
