/**
 * @module utils/url
 * @fileoverview URL normalization and crawl-scope classification.
 *
 * Every URL the crawler stores (frontier entries, the visited and discovered
 * sets, broken-link records) goes through {@link normalizeUrl} first, so two
 * hrefs that name the same page collapse into one string.
 *
 * ## Normalization Rules (applied in order)
 * 1. Resolve the link against the page URL (WHATWG URL resolution; this also
 *    lowercases scheme and host and drops default ports).
 * 2. Remove the fragment (`#section`).
 * 3. Trim surrounding whitespace.
 * 4. Remove trailing slashes.
 *
 * @example
 * ```ts
 * import { normalizeUrl, isInternalUrl } from "./utils/url.js";
 *
 * normalizeUrl("https://example.com/docs/intro", "../blog/#top");
 * // => "https://example.com/blog"
 *
 * isInternalUrl("https://example.com", "http://example.com/about");
 * // => true
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Schemes that are never crawled. Links with these schemes are dropped before
 * they reach the frontier.
 */
const NON_CRAWLABLE_SCHEMES: readonly string[] = [
  "mailto:",
  "tel:",
  "javascript:",
  "data:",
];

/* ────────────────────────────────────────────────────────────────────────────
 * URL Normalization
 * ──────────────────────────────────────────────────────────────────────────── */

function dropFragment(url: string): string {
  const hashIndex = url.indexOf("#");
  return hashIndex === -1 ? url : url.slice(0, hashIndex);
}

function stripTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Normalize `link` relative to `base` into the canonical form used for
 * deduplication.
 *
 * Never throws. When the pair cannot be resolved (e.g. a relative link
 * against a malformed base), the raw link is cleaned with the same fragment,
 * whitespace and slash rules and returned as-is; fetching it later fails and
 * records it as broken.
 *
 * Normalizing an already-normalized URL returns it unchanged, and links that
 * differ only by fragment or trailing slash normalize to the same string.
 *
 * @param base - Absolute URL of the page containing the link.
 * @param link - Raw href value, absolute or relative. Pass `""` to normalize
 *   `base` itself.
 *
 * @example
 * ```ts
 * normalizeUrl("https://example.com/docs/", "intro#setup");
 * // => "https://example.com/docs/intro"
 *
 * normalizeUrl("https://Example.COM/", "");
 * // => "https://example.com"
 *
 * normalizeUrl("https://example.com", "mailto:someone@example.com");
 * // => "mailto:someone@example.com"
 * ```
 */
export function normalizeUrl(base: string, link: string): string {
  let joined: string;
  try {
    const parsed = new URL(link.trim(), base);
    parsed.hash = "";
    joined = parsed.href;
  } catch {
    joined = dropFragment(link);
  }

  return stripTrailingSlashes(joined.trim());
}

/* ────────────────────────────────────────────────────────────────────────────
 * Scope Classification
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Whether `url` lives on the same network location as the crawl's base URL.
 *
 * Compares `URL.host` (hostname plus any non-default port); the scheme is
 * ignored, so `http://example.com/a` is internal to `https://example.com`.
 * URLs that cannot be parsed, and URLs without a host (`mailto:`, `tel:`),
 * are external.
 *
 * @example
 * ```ts
 * isInternalUrl("https://example.com", "https://example.com/about"); // true
 * isInternalUrl("https://example.com", "https://other.com/page");    // false
 * isInternalUrl("https://example.com", "https://example.com:8080/"); // false
 * ```
 */
export function isInternalUrl(baseUrl: string, url: string): boolean {
  try {
    const baseHost = new URL(baseUrl).host;
    const host = new URL(url).host;
    return host !== "" && host === baseHost;
  } catch {
    return false;
  }
}

/**
 * Whether `url` may enter the frontier at all. Returns `false` for
 * `mailto:`, `tel:`, `javascript:` and `data:` links (case-insensitive).
 *
 * @example
 * ```ts
 * hasCrawlableScheme("mailto:test@example.com"); // false
 * hasCrawlableScheme("TEL:+123");                // false
 * hasCrawlableScheme("https://example.com/a");   // true
 * ```
 */
export function hasCrawlableScheme(url: string): boolean {
  const lower = url.trim().toLowerCase();
  return !NON_CRAWLABLE_SCHEMES.some((scheme) => lower.startsWith(scheme));
}
