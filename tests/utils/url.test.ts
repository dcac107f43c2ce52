/**
 * @fileoverview Tests for URL normalization and scope classification.
 *
 * Covers: normalizeUrl, isInternalUrl, hasCrawlableScheme.
 */

import { describe, it, expect } from "vitest";
import { hasCrawlableScheme, isInternalUrl, normalizeUrl } from "../../src/utils/url.js";

// ---------------------------------------------------------------------------
// normalizeUrl
// ---------------------------------------------------------------------------

describe("normalizeUrl", () => {
  it("resolves a relative link against the page URL", () => {
    expect(normalizeUrl("https://example.com/docs/", "intro")).toBe("https://example.com/docs/intro");
  });

  it("resolves parent-relative links", () => {
    expect(normalizeUrl("https://example.com/docs/intro", "../blog/#top")).toBe(
      "https://example.com/blog",
    );
  });

  it("resolves root-relative links", () => {
    expect(normalizeUrl("https://example.com/docs/intro", "/about")).toBe("https://example.com/about");
  });

  it("keeps absolute links on other hosts", () => {
    expect(normalizeUrl("https://example.com", "https://other.test/page")).toBe(
      "https://other.test/page",
    );
  });

  it("removes the fragment", () => {
    expect(normalizeUrl("https://example.com/page", "#section")).toBe("https://example.com/page");
  });

  it("keeps the query string", () => {
    expect(normalizeUrl("https://example.com", "/a?x=1#frag")).toBe("https://example.com/a?x=1");
  });

  it("removes trailing slashes", () => {
    expect(normalizeUrl("https://example.com", "/a/")).toBe("https://example.com/a");
    expect(normalizeUrl("https://example.com", "/a//")).toBe("https://example.com/a");
  });

  it("normalizes the base URL itself when the link is empty", () => {
    expect(normalizeUrl("https://Example.COM/", "")).toBe("https://example.com");
  });

  it("trims whitespace around the link", () => {
    expect(normalizeUrl("https://example.com", "  /a  ")).toBe("https://example.com/a");
  });

  it("maps links that differ only by fragment or trailing slash to one string", () => {
    const base = "https://example.com/docs/";
    const forms = ["page", "page/", "page#top", "page/#top", "/docs/page"];
    const normalized = new Set(forms.map((form) => normalizeUrl(base, form)));
    expect([...normalized]).toEqual(["https://example.com/docs/page"]);
  });

  it("returns an already-normalized URL unchanged", () => {
    const urls = [
      "https://example.com",
      "https://example.com/a/b",
      "https://example.com/a?x=1",
      "http://example.com:8080/path",
    ];
    for (const url of urls) {
      expect(normalizeUrl(url, "")).toBe(url);
      expect(normalizeUrl(normalizeUrl(url, ""), "")).toBe(url);
    }
  });

  it("passes non-http schemes through", () => {
    expect(normalizeUrl("https://example.com", "mailto:someone@example.com")).toBe(
      "mailto:someone@example.com",
    );
  });

  it("cleans the raw link when it cannot be resolved", () => {
    expect(normalizeUrl("not a url", "page#x")).toBe("page");
    expect(normalizeUrl("not a url", " page/ ")).toBe("page");
  });
});

// ---------------------------------------------------------------------------
// isInternalUrl
// ---------------------------------------------------------------------------

describe("isInternalUrl", () => {
  it("accepts URLs on the same host", () => {
    expect(isInternalUrl("https://example.com", "https://example.com/about")).toBe(true);
  });

  it("ignores the scheme", () => {
    expect(isInternalUrl("https://example.com", "http://example.com/about")).toBe(true);
  });

  it("rejects other hosts and subdomains", () => {
    expect(isInternalUrl("https://example.com", "https://other.com/page")).toBe(false);
    expect(isInternalUrl("https://example.com", "https://blog.example.com/page")).toBe(false);
  });

  it("treats a different port as external", () => {
    expect(isInternalUrl("https://example.com", "https://example.com:8080/")).toBe(false);
  });

  it("treats host-less and unparseable URLs as external", () => {
    expect(isInternalUrl("https://example.com", "mailto:someone@example.com")).toBe(false);
    expect(isInternalUrl("https://example.com", "page")).toBe(false);
    expect(isInternalUrl("not a url", "https://example.com")).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// hasCrawlableScheme
// ---------------------------------------------------------------------------

describe("hasCrawlableScheme", () => {
  it("rejects mailto, tel, javascript and data links", () => {
    expect(hasCrawlableScheme("mailto:test@example.com")).toBe(false);
    expect(hasCrawlableScheme("tel:+100")).toBe(false);
    expect(hasCrawlableScheme("javascript:void(0)")).toBe(false);
    expect(hasCrawlableScheme("data:text/plain,hi")).toBe(false);
  });

  it("is case-insensitive", () => {
    expect(hasCrawlableScheme("TEL:+100")).toBe(false);
    expect(hasCrawlableScheme("MailTo:test@example.com")).toBe(false);
  });

  it("accepts http and https URLs", () => {
    expect(hasCrawlableScheme("https://example.com/a")).toBe(true);
    expect(hasCrawlableScheme("http://example.com/a")).toBe(true);
  });
});
