/**
 * @fileoverview Tests for the end-of-run statistics and broken-link tables.
 */

import { describe, it, expect } from "vitest";
import type { CrawlSnapshot } from "../../src/crawler/crawl-state.js";
import type { BrokenLinkRecord, HistogramKey } from "../../src/crawler/types.js";
import {
  NO_BROKEN_LINKS_MESSAGE,
  formatRunSummary,
  renderBrokenLinksSummary,
  renderStatsTable,
} from "../../src/report/summary.js";
import { renderTable } from "../../src/report/table.js";

function snapshot(histogram: Array<[HistogramKey, number]>): CrawlSnapshot {
  return { discovered: 9, checked: 8, inQueue: 1, broken: 4, histogram: new Map(histogram) };
}

describe("renderStatsTable", () => {
  it("lists counters, highlighted statuses, other statuses in order, then errors", () => {
    const table = renderStatsTable(
      snapshot([
        [200, 3],
        [503, 2],
        [404, 1],
        [301, 1],
        ["error", 1],
      ]),
    );

    expect(table).toBe(
      renderTable(
        "📊 Link Checking Progress",
        [{ header: "Metric" }, { header: "Count", align: "right" }],
        [
          ["Links Discovered", "9"],
          ["Links Checked", "8"],
          ["🔁 In Queue", "1"],
          ["✅ 200 OK", "3"],
          ["⚠️ 400 Bad Request", "0"],
          ["❌ 404 Not Found", "1"],
          ["🔥 500 Server Error", "0"],
          ["301", "1"],
          ["503", "2"],
          ["⚠️ Other Errors", "1"],
        ],
      ),
    );
  });

  it("shows zero for statuses never seen", () => {
    const lines = renderStatsTable(snapshot([])).split("\n");

    expect(lines[0]).toBe("📊 Link Checking Progress");
    expect(lines).toHaveLength(4 + 8 + 1);
  });
});

describe("renderBrokenLinksSummary", () => {
  it("prints the all-clear message when nothing is broken", () => {
    expect(renderBrokenLinksSummary([])).toBe(NO_BROKEN_LINKS_MESSAGE);
  });

  it("lists each broken link with its error and source", () => {
    const records: BrokenLinkRecord[] = [
      { url: "https://example.com/b", outcome: { kind: "http_error", status: 404 }, sourceUrl: "https://example.com" },
      {
        url: "https://example.com/down",
        outcome: { kind: "transport_error", description: "[TIMEOUT] slow" },
        sourceUrl: "root",
      },
    ];

    expect(renderBrokenLinksSummary(records).split("\n")).toEqual([
      "❌ Broken Links Summary (400, 404, 500, etc.)",
      "+-------+--------------------------+---------------------+",
      "| Error | URL                      | Source              |",
      "+-------+--------------------------+---------------------+",
      "| 404   | https://example.com/b    | https://example.com |",
      "| ERROR | https://example.com/down | root                |",
      "+-------+--------------------------+---------------------+",
    ]);
  });
});

describe("formatRunSummary", () => {
  it("describes pages, waves, depth and duration", () => {
    expect(
      formatRunSummary({
        pagesChecked: 4,
        linksDiscovered: 5,
        brokenLinks: 1,
        waves: 3,
        maxDepthReached: 2,
        durationMs: 1234,
      }),
    ).toBe("⏱️ Checked 4 of 5 discovered links in 3 waves (max depth 2), 1.2s");
  });
});
