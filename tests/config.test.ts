import { afterEach, describe, it, expect, vi } from "vitest";
import { loadConfig } from "../src/config.js";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("loadConfig", () => {
  it("reads settings from the environment", () => {
    vi.stubEnv("MAX_DEPTH", "3");
    vi.stubEnv("MAX_CONCURRENT", "4");
    vi.stubEnv("FETCH_TIMEOUT", "2500");
    vi.stubEnv("USER_AGENT", "test-agent/0.1");
    vi.stubEnv("PROGRESS_INTERVAL", "0");
    vi.stubEnv("LOG_LEVEL", "WARN");

    expect(loadConfig()).toMatchObject({
      defaultMaxDepth: 3,
      defaultConcurrency: 4,
      fetchTimeout: 2500,
      userAgent: "test-agent/0.1",
      progressInterval: 0,
      logLevel: "warn",
    });
  });

  it("falls back to info for unknown log levels", () => {
    vi.stubEnv("LOG_LEVEL", "verbose");
    expect(loadConfig().logLevel).toBe("info");
  });
});
