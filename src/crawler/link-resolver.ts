/**
 * @module crawler/link-resolver
 * @fileoverview Hyperlink discovery for the crawl task.
 *
 * Given the HTML of a fetched page, returns the raw `href` values of its
 * anchors. Resolution, normalization and scope filtering happen in the crawl
 * task, which owns the dedup gate; this module only parses.
 *
 * cheerio (htmlparser2 under the hood) is lenient: unclosed tags, stray
 * attributes and truncated documents still parse, and anchors before the
 * damage are found. Should the parser throw anyway, the page yields no links
 * instead of failing the task.
 *
 * ## Architecture Position
 * ```
 *   bfs-crawler  -->  fetch-task  -->  link-resolver  (this file)
 *                          |
 *                          +-->  utils/url  (normalizeUrl, isInternalUrl)
 * ```
 *
 * @example
 * ```ts
 * import { extractHrefs } from "./link-resolver.js";
 *
 * extractHrefs('<a href="/about">About</a><a name="top">Top</a><a href="/about">Again</a>');
 * // => ["/about"]
 * ```
 */

import * as cheerio from "cheerio";
import { createLogger } from "../utils/logger.js";

const log = createLogger("link-resolver");

/**
 * Extract the distinct, non-empty `href` values of all `<a>` elements, in
 * document order, trimmed.
 *
 * Values are returned exactly as written (relative paths, `mailto:`,
 * fragments); anchors without `href` are skipped.
 *
 * @param html - Page body.
 * @returns Candidate link strings; `[]` for a page that cannot be parsed.
 */
export function extractHrefs(html: string): string[] {
  let $: cheerio.CheerioAPI;
  try {
    $ = cheerio.load(html);
  } catch (error: unknown) {
    log.debug("Unparseable HTML, no links extracted:", String(error));
    return [];
  }

  const seen = new Set<string>();

  $("a[href]").each((_index, element) => {
    const href = $(element).attr("href")?.trim();
    if (href) {
      seen.add(href);
    }
  });

  return [...seen];
}
