/**
 * @fileoverview Tests for command-line parsing.
 */

import { describe, it, expect } from "vitest";
import { parseCliArgs, type CliCommand } from "../../src/cli/options.js";
import { ConfigError } from "../../src/utils/errors.js";
import { testConfig } from "../helpers/test-config.js";

function parse(...argv: string[]): CliCommand {
  return parseCliArgs(argv, testConfig);
}

function issuesOf(...argv: string[]): string[] {
  try {
    parse(...argv);
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error("expected a ConfigError");
}

describe("parseCliArgs: valid input", () => {
  it("applies defaults from the configuration", () => {
    expect(parse("-u", "https://example.com")).toEqual({
      kind: "run",
      options: {
        url: "https://example.com",
        maxDepth: 5,
        concurrency: 10,
        timeoutMs: 10000,
        progress: true,
      },
    });
  });

  it("reads short and long flags", () => {
    expect(
      parse(
        "--url",
        "https://example.com/docs",
        "-d",
        "2",
        "-t",
        "4",
        "-e",
        "broken.csv",
        "--export-realtime",
        "live_broken.csv",
        "--timeout",
        "2500",
        "--no-progress",
      ),
    ).toEqual({
      kind: "run",
      options: {
        url: "https://example.com/docs",
        maxDepth: 2,
        concurrency: 4,
        timeoutMs: 2500,
        exportPath: "broken.csv",
        realtimeExportPath: "live_broken.csv",
        progress: false,
      },
    });
  });

  it("accepts --concurrency as an alias for --threads", () => {
    const command = parse("-u", "https://example.com", "--concurrency", "3");
    expect(command.kind === "run" && command.options.concurrency).toBe(3);
  });

  it("prefers --threads over --concurrency", () => {
    const command = parse("-u", "https://example.com", "--concurrency", "3", "-t", "7");
    expect(command.kind === "run" && command.options.concurrency).toBe(7);
  });

  it("accepts depth 0", () => {
    const command = parse("-u", "https://example.com", "--depth=0");
    expect(command.kind === "run" && command.options.maxDepth).toBe(0);
  });

  it("parses the export status list", () => {
    const command = parse("-u", "https://example.com", "--export-status", "400, 404,500");
    expect(command.kind === "run" && command.options.exportStatusCodes).toEqual([400, 404, 500]);
  });

  it("returns help without validating the rest", () => {
    expect(parse("-h")).toEqual({ kind: "help" });
    expect(parse("--help", "--depth=-3")).toEqual({ kind: "help" });
  });
});

describe("parseCliArgs: invalid input", () => {
  it("requires a URL", () => {
    expect(issuesOf()).toEqual(["--url: A base URL is required"]);
  });

  it("rejects relative and non-http URLs", () => {
    expect(issuesOf("-u", "example.com")[0]).toBe("--url: Expected an absolute URL");
    expect(issuesOf("-u", "ftp://example.com")).toEqual([
      "--url: Only http:// and https:// URLs can be crawled",
    ]);
  });

  it("rejects non-integer and out-of-range numbers", () => {
    expect(issuesOf("-u", "https://example.com", "-d", "abc")).toEqual(["--depth: Expected an integer"]);
    expect(issuesOf("-u", "https://example.com", "--depth=-1")).toEqual(["--depth: Must be at least 0"]);
    expect(issuesOf("-u", "https://example.com", "-t", "0")).toEqual(["--threads: Must be at least 1"]);
    expect(issuesOf("-u", "https://example.com", "--timeout", "1.5")).toEqual([
      "--timeout: Expected an integer",
    ]);
  });

  it("rejects blank numeric values instead of reading them as 0", () => {
    expect(issuesOf("-u", "https://example.com", "-d", "")).toEqual(["--depth: Expected an integer"]);
    expect(issuesOf("-u", "https://example.com", "-d", "  ")).toEqual(["--depth: Expected an integer"]);
    expect(issuesOf("-u", "https://example.com", "-t", "")).toEqual(["--threads: Expected an integer"]);
    expect(() => parse("-u", "https://example.com", "--depth=")).toThrow(ConfigError);
  });

  it("accepts numbers surrounded by whitespace", () => {
    const command = parse("-u", "https://example.com", "-d", " 3 ");
    expect(command.kind === "run" && command.options.maxDepth).toBe(3);
  });

  it("rejects status codes outside 400-599", () => {
    expect(issuesOf("-u", "https://example.com", "--export-status", "200")).toEqual([
      "--export-status: Status codes must be between 400 and 599",
    ]);
  });

  it("reports every offending flag at once", () => {
    expect(issuesOf("-d", "x", "-t", "0")).toEqual([
      "--url: A base URL is required",
      "--depth: Expected an integer",
      "--threads: Must be at least 1",
    ]);
  });

  it("rejects unknown flags and positionals", () => {
    expect(() => parse("-u", "https://example.com", "--bogus")).toThrow(ConfigError);
    expect(() => parse("https://example.com")).toThrow(ConfigError);
  });

  it("summarizes the issues in the message", () => {
    expect(() => parse("-u", "https://example.com", "-t", "0")).toThrow(
      "Invalid arguments:\n  --threads: Must be at least 1",
    );
  });
});
