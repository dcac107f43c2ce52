/**
 * @module crawler/types
 * @fileoverview Data model shared by the crawl state, the fetch task, the
 * scheduler and the reporting layer.
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Frontier
 * ──────────────────────────────────────────────────────────────────────────── */

/** `sourceUrl` of the seed entry, which no page linked to. */
export const ROOT_SOURCE = "root";

/**
 * One unit of crawl work: a URL to check, how far it is from the seed, and
 * the page that linked to it.
 */
export interface FrontierEntry {
  /** Normalized URL to fetch. */
  url: string;

  /**
   * Link-hops from the base URL. The seed is depth 0, its links depth 1, etc.
   */
  depth: number;

  /** Normalized URL of the referring page, or {@link ROOT_SOURCE}. */
  sourceUrl: string;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Outcomes
 * ──────────────────────────────────────────────────────────────────────────── */

/** The server answered with a status below 400. */
export interface SuccessOutcome {
  kind: "success";
  status: number;
}

/** The server answered with a status of 400 or above. */
export interface HttpErrorOutcome {
  kind: "http_error";
  status: number;
}

/** No HTTP response was obtained (DNS, connect, TLS, timeout, protocol). */
export interface TransportErrorOutcome {
  kind: "transport_error";
  description: string;
}

/** Classification of one fetch. */
export type Outcome = SuccessOutcome | HttpErrorOutcome | TransportErrorOutcome;

/** The outcomes that make a link broken. */
export type BrokenOutcome = Exclude<Outcome, SuccessOutcome>;

/**
 * Classify an HTTP status code.
 *
 * @example
 * ```ts
 * classifyStatus(200); // { kind: "success", status: 200 }
 * classifyStatus(404); // { kind: "http_error", status: 404 }
 * ```
 */
export function classifyStatus(status: number): SuccessOutcome | HttpErrorOutcome {
  return status >= 400 ? { kind: "http_error", status } : { kind: "success", status };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Results
 * ──────────────────────────────────────────────────────────────────────────── */

/** Histogram key for transport failures. */
export const TRANSPORT_ERROR_KEY = "error";

/** HTTP status code, or {@link TRANSPORT_ERROR_KEY}. */
export type HistogramKey = number | typeof TRANSPORT_ERROR_KEY;

/** A broken target together with the page that referenced it. */
export interface BrokenLinkRecord {
  /** Normalized URL that failed. */
  url: string;
  outcome: BrokenOutcome;
  /** Normalized referring page, or {@link ROOT_SOURCE}. */
  sourceUrl: string;
}
