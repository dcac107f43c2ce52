/**
 * @module report/summary
 * @fileoverview End-of-run console output: the status statistics and the
 * broken-link summary.
 */

import type { CrawlSummary } from "../crawler/bfs-crawler.js";
import type { CrawlSnapshot } from "../crawler/crawl-state.js";
import { TRANSPORT_ERROR_KEY, type BrokenLinkRecord } from "../crawler/types.js";
import { errorCell } from "../export/csv.js";
import { renderTable } from "./table.js";

/** Printed instead of the table when the crawl found nothing broken. */
export const NO_BROKEN_LINKS_MESSAGE = "✅ No broken links found.";

/**
 * One line describing the run as a whole.
 *
 * @example
 * ```ts
 * formatRunSummary({ pagesChecked: 4, linksDiscovered: 4, brokenLinks: 1,
 *   waves: 3, maxDepthReached: 2, durationMs: 1234 });
 * // => "⏱️ Checked 4 of 4 discovered links in 3 waves (max depth 2), 1.2s"
 * ```
 */
export function formatRunSummary(summary: CrawlSummary): string {
  const seconds = (summary.durationMs / 1000).toFixed(1);
  return (
    `⏱️ Checked ${summary.pagesChecked} of ${summary.linksDiscovered} discovered links ` +
    `in ${summary.waves} waves (max depth ${summary.maxDepthReached}), ${seconds}s`
  );
}

/**
 * Status rows always shown in the statistics table, with their labels.
 * Other codes seen during the crawl are listed after these.
 */
const HIGHLIGHTED_STATUSES: ReadonlyArray<[number, string]> = [
  [200, "✅ 200 OK"],
  [400, "⚠️ 400 Bad Request"],
  [404, "❌ 404 Not Found"],
  [500, "🔥 500 Server Error"],
];

/**
 * Statistics table: discovery counters, the highlighted status codes, any
 * other status code seen, and transport errors.
 *
 * @example
 * ```
 * 📊 Link Checking Progress
 * +-----------------------+-------+
 * | Metric                | Count |
 * +-----------------------+-------+
 * | Links Discovered      |     4 |
 * ...
 * ```
 */
export function renderStatsTable(snapshot: CrawlSnapshot): string {
  const count = (key: number | typeof TRANSPORT_ERROR_KEY): string =>
    String(snapshot.histogram.get(key) ?? 0);

  const highlighted = new Set(HIGHLIGHTED_STATUSES.map(([status]) => status));
  const otherStatuses = [...snapshot.histogram.keys()]
    .filter((key): key is number => typeof key === "number" && !highlighted.has(key))
    .sort((a, b) => a - b);

  const rows: string[][] = [
    ["Links Discovered", String(snapshot.discovered)],
    ["Links Checked", String(snapshot.checked)],
    ["🔁 In Queue", String(snapshot.inQueue)],
    ...HIGHLIGHTED_STATUSES.map(([status, label]) => [label, count(status)]),
    ...otherStatuses.map((status) => [`${status}`, count(status)]),
    ["⚠️ Other Errors", count(TRANSPORT_ERROR_KEY)],
  ];

  return renderTable(
    "📊 Link Checking Progress",
    [{ header: "Metric" }, { header: "Count", align: "right" }],
    rows,
  );
}

/**
 * Broken-link table in completion order, or {@link NO_BROKEN_LINKS_MESSAGE}.
 */
export function renderBrokenLinksSummary(records: readonly BrokenLinkRecord[]): string {
  if (records.length === 0) {
    return NO_BROKEN_LINKS_MESSAGE;
  }

  return renderTable(
    "❌ Broken Links Summary (400, 404, 500, etc.)",
    [{ header: "Error" }, { header: "URL" }, { header: "Source" }],
    records.map((record) => [errorCell(record.outcome), record.url, record.sourceUrl]),
  );
}
