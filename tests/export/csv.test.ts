/**
 * @fileoverview Tests for CSV encoding and the end-of-run export.
 */

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { BrokenLinkRecord } from "../../src/crawler/types.js";
import {
  csvHeaderLine,
  errorCell,
  escapeCsvField,
  exportBrokenLinks,
  formatCsvRow,
  matchesExportFilter,
  renderCsv,
} from "../../src/export/csv.js";
import { ExportError } from "../../src/utils/errors.js";

const notFound: BrokenLinkRecord = {
  url: "https://example.com/b",
  outcome: { kind: "http_error", status: 404 },
  sourceUrl: "https://example.com",
};
const forbidden: BrokenLinkRecord = {
  url: "https://example.com/private",
  outcome: { kind: "http_error", status: 403 },
  sourceUrl: "https://example.com/a",
};
const unreachable: BrokenLinkRecord = {
  url: "https://example.com/down",
  outcome: { kind: "transport_error", description: "[TIMEOUT] slow" },
  sourceUrl: "root",
};

describe("escapeCsvField", () => {
  it("leaves plain values alone", () => {
    expect(escapeCsvField("https://example.com/a")).toBe("https://example.com/a");
  });

  it("quotes values with commas, quotes or line breaks", () => {
    expect(escapeCsvField("https://example.com/a?x=1,2")).toBe('"https://example.com/a?x=1,2"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField("a\nb")).toBe('"a\nb"');
  });
});

describe("row encoding", () => {
  it("writes the header", () => {
    expect(csvHeaderLine()).toBe("Error,URL,Source\n");
  });

  it("uses the status code or ERROR in the first column", () => {
    expect(errorCell(notFound.outcome)).toBe("404");
    expect(errorCell(unreachable.outcome)).toBe("ERROR");
  });

  it("formats one record per line", () => {
    expect(formatCsvRow(notFound)).toBe("404,https://example.com/b,https://example.com\n");
    expect(formatCsvRow(unreachable)).toBe("ERROR,https://example.com/down,root\n");
  });
});

describe("export filter", () => {
  it("keeps everything without status codes", () => {
    expect([notFound, forbidden, unreachable].every((r) => matchesExportFilter(r, {}))).toBe(true);
  });

  it("limits HTTP errors to the listed codes and always keeps transport errors", () => {
    const filter = { statusCodes: [400, 404, 500] };
    expect(matchesExportFilter(notFound, filter)).toBe(true);
    expect(matchesExportFilter(forbidden, filter)).toBe(false);
    expect(matchesExportFilter(unreachable, filter)).toBe(true);
  });

  it("renders only matching rows", () => {
    expect(renderCsv([notFound, forbidden, unreachable], { statusCodes: [400, 404, 500] })).toBe(
      "Error,URL,Source\n" +
        "404,https://example.com/b,https://example.com\n" +
        "ERROR,https://example.com/down,root\n",
    );
  });

  it("renders just the header for no records", () => {
    expect(renderCsv([])).toBe("Error,URL,Source\n");
  });
});

describe("exportBrokenLinks", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "link-checker-csv-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the file and returns the row count", async () => {
    const path = join(dir, "broken.csv");

    const rows = await exportBrokenLinks(path, [notFound, forbidden]);

    expect(rows).toBe(2);
    expect(await readFile(path, "utf-8")).toBe(
      "Error,URL,Source\n" +
        "404,https://example.com/b,https://example.com\n" +
        "403,https://example.com/private,https://example.com/a\n",
    );
  });

  it("replaces an existing file", async () => {
    const path = join(dir, "broken.csv");
    await exportBrokenLinks(path, [notFound, forbidden, unreachable]);

    const rows = await exportBrokenLinks(path, [notFound], { statusCodes: [404] });

    expect(rows).toBe(1);
    expect(await readFile(path, "utf-8")).toBe(
      "Error,URL,Source\n404,https://example.com/b,https://example.com\n",
    );
  });

  it("wraps write failures in ExportError", async () => {
    const path = join(dir, "missing", "broken.csv");

    await expect(exportBrokenLinks(path, [notFound])).rejects.toBeInstanceOf(ExportError);
  });
});
