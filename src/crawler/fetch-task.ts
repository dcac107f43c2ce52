/**
 * @module crawler/fetch-task
 * @fileoverview One unit of crawl work: check a frontier entry and return the
 * new entries it leads to.
 *
 * ## Steps
 * ```
 *   FrontierEntry
 *      |
 *      +-- depth > maxDepth ------------------------------> []
 *      +-- tryMarkVisited() false (someone owns it) ------> []
 *      |
 *      v
 *   fetcher.fetch(url)
 *      |-- throws ---> histogram["error"]++, broken(transport) --> []
 *      |
 *      v
 *   histogram[status]++
 *      |-- status >= 400 ---> broken(http) -------------------> []
 *      |
 *      v
 *   extractHrefs(body)
 *      --> normalize against the final page URL
 *      --> drop mailto:/tel:/javascript:/data:
 *      --> drop external hosts
 *      --> drop when tryMarkDiscovered() is false
 *      --> FrontierEntry { url, depth + 1, sourceUrl: entry.url }
 * ```
 *
 * A URL beyond the depth limit is not marked visited: it stays discovered
 * but unchecked, and it is not retried.
 *
 * Fetch failures never escape this function; they become broken-link
 * records. The only way it can reject is a failing realtime sink write.
 */

import type { CrawlState } from "./crawl-state.js";
import { extractHrefs } from "./link-resolver.js";
import {
  TRANSPORT_ERROR_KEY,
  classifyStatus,
  type FrontierEntry,
} from "./types.js";
import type { PageFetcher, PageResponse } from "../services/fetch.js";
import { formatError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { hasCrawlableScheme, isInternalUrl, normalizeUrl } from "../utils/url.js";

const log = createLogger("fetch-task");

/** Everything a task needs besides its entry. Shared by all tasks of a run. */
export interface TaskContext {
  /** Normalized base URL; decides which links are internal. */
  baseUrl: string;
  /** Entries deeper than this are dropped without a fetch. */
  maxDepth: number;
  state: CrawlState;
  fetcher: PageFetcher;
}

/**
 * Check one frontier entry.
 *
 * @returns New frontier entries discovered on the page; `[]` when the entry
 *   was skipped, broken, or had no new internal links.
 */
export async function fetchAndExtract(
  entry: FrontierEntry,
  context: TaskContext,
): Promise<FrontierEntry[]> {
  const { state, fetcher } = context;

  if (entry.depth > context.maxDepth) {
    return [];
  }

  if (!state.tryMarkVisited(entry.url)) {
    return [];
  }

  let response: PageResponse;
  try {
    response = await fetcher.fetch(entry.url);
  } catch (error: unknown) {
    const description = formatError(error);
    log.debug(`Transport error for ${entry.url}: ${description}`);

    state.recordStatus(TRANSPORT_ERROR_KEY);
    await state.recordBroken(
      entry.url,
      { kind: "transport_error", description },
      entry.sourceUrl,
    );
    return [];
  }

  state.recordStatus(response.status);

  const outcome = classifyStatus(response.status);
  if (outcome.kind === "http_error") {
    log.debug(`HTTP ${outcome.status} for ${entry.url} (linked from ${entry.sourceUrl})`);
    await state.recordBroken(entry.url, outcome, entry.sourceUrl);
    return [];
  }

  return discoverLinks(entry, response, context);
}

/**
 * Turn the hrefs of a successfully fetched page into new frontier entries.
 */
function discoverLinks(
  entry: FrontierEntry,
  response: PageResponse,
  context: TaskContext,
): FrontierEntry[] {
  const pageUrl = response.url || entry.url;
  const next: FrontierEntry[] = [];

  for (const href of extractHrefs(response.body)) {
    const url = normalizeUrl(pageUrl, href);

    if (!hasCrawlableScheme(url)) {
      continue;
    }
    if (!isInternalUrl(context.baseUrl, url)) {
      continue;
    }
    if (!context.state.tryMarkDiscovered(url)) {
      continue;
    }

    next.push({ url, depth: entry.depth + 1, sourceUrl: entry.url });
  }

  return next;
}
