/**
 * @fileoverview HTTP client used by the crawl task.
 *
 * Wraps the Node.js native `fetch()` and reduces every request to one of two
 * results:
 *
 * - a {@link PageResponse} carrying the status code (any status, 2xx to 5xx)
 *   and, for HTML-like responses, the body text;
 * - a thrown {@link FetchError} or {@link TimeoutError} when no response was
 *   obtained.
 *
 * Unlike a content reader, this client never rejects on a 4xx/5xx status:
 * the status is the information the link checker is after.
 *
 * ## Architecture
 *
 * ```
 *   HttpPageFetcher.fetch(url)
 *     |
 *     +--> URL parsing & protocol check (http/https only)
 *     |
 *     +--> Native fetch() with:
 *     |     - AbortSignal.timeout
 *     |     - User-Agent header
 *     |     - redirect: "follow"
 *     |
 *     +--> Content-Type check
 *     |     - HTML-like: body read with a byte limit
 *     |     - anything else: body discarded
 *     |
 *     +--> PageResponse
 * ```
 *
 * @module services/fetch
 */

import { config } from "../config.js";
import { FetchError, TimeoutError, formatError } from "../utils/errors.js";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/**
 * What the crawl task needs to know about one HTTP response.
 *
 * @example
 * ```typescript
 * const response: PageResponse = {
 *   status: 200,
 *   url: "https://example.com/docs/",
 *   contentType: "text/html; charset=utf-8",
 *   body: "<!DOCTYPE html><html>...</html>",
 * };
 * ```
 */
export interface PageResponse {
  /** HTTP status of the final response (after redirects). */
  status: number;

  /**
   * The final URL after redirects. Relative links in `body` resolve against
   * this URL, not the requested one.
   */
  url: string;

  /** Raw Content-Type header, or `""` when absent. */
  contentType: string;

  /**
   * Body text for HTML-like responses, truncated at the size limit;
   * `""` for every other content type.
   */
  body: string;
}

/**
 * Anything that can turn a URL into a {@link PageResponse}.
 *
 * The crawler depends on this interface only; tests substitute an in-memory
 * site for {@link HttpPageFetcher}.
 */
export interface PageFetcher {
  /**
   * @throws {FetchError} When no HTTP response could be obtained.
   * @throws {TimeoutError} When the request exceeded its time budget.
   */
  fetch(url: string): Promise<PageResponse>;
}

/** Settings for {@link HttpPageFetcher}. All default to {@link config}. */
export interface HttpFetcherOptions {
  /** Per-request timeout in milliseconds. */
  timeoutMs?: number;
  /** Body bytes read at most from one response. */
  maxResponseSize?: number;
  /** User-Agent header value. */
  userAgent?: string;
}

// ---------------------------------------------------------------------------
// Content-Type Allowlist
// ---------------------------------------------------------------------------

/**
 * MIME types whose bodies are parsed for links. A 200 on an image or a PDF
 * still counts as a working link; its body is simply not read.
 */
const HTML_CONTENT_TYPES = new Set<string>([
  "text/html",
  "application/xhtml+xml",
]);

// ---------------------------------------------------------------------------
// Helper Functions
// ---------------------------------------------------------------------------

/**
 * Extracts the MIME type from a Content-Type header value.
 *
 * @example
 * ```typescript
 * extractMimeType("text/html; charset=utf-8"); // => "text/html"
 * extractMimeType(null);                       // => ""
 * ```
 */
function extractMimeType(contentType: string | null): string {
  if (!contentType) {
    return "";
  }
  return contentType.split(";")[0].trim().toLowerCase();
}

/**
 * Whether a response body should be read for links.
 *
 * A missing Content-Type is treated as HTML: small static servers often omit
 * it for `.html` files.
 */
export function isHtmlContentType(contentType: string | null): boolean {
  const mimeType = extractMimeType(contentType);
  return mimeType === "" || HTML_CONTENT_TYPES.has(mimeType);
}

/**
 * Reads a Response body as text, stopping after `maxBytes`.
 *
 * Bytes past the limit are not downloaded: the stream is cancelled and the
 * text read so far is returned. Links beyond the cut-off are not discovered.
 *
 * @throws {FetchError} If the connection fails while the body is streaming.
 */
async function readBodyWithLimit(response: Response, maxBytes: number): Promise<string> {
  if (!response.body) {
    return "";
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder("utf-8", { fatal: false });
  const chunks: string[] = [];
  let totalBytes = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }

      const remaining = maxBytes - totalBytes;
      if (value.byteLength >= remaining) {
        chunks.push(decoder.decode(value.subarray(0, remaining)));
        await reader.cancel();
        return chunks.join("");
      }

      totalBytes += value.byteLength;
      // `stream: true` keeps multi-byte characters split across chunks intact.
      chunks.push(decoder.decode(value, { stream: true }));
    }

    chunks.push(decoder.decode());
  } catch (error) {
    throw new FetchError(
      `Error reading response body: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return chunks.join("");
}

function isAbortOrTimeout(error: unknown): boolean {
  return (
    error instanceof DOMException &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

// ---------------------------------------------------------------------------
// HttpPageFetcher
// ---------------------------------------------------------------------------

/**
 * {@link PageFetcher} backed by the global `fetch()`.
 *
 * @example
 * ```typescript
 * const fetcher = new HttpPageFetcher({ timeoutMs: 5000 });
 *
 * try {
 *   const page = await fetcher.fetch("https://example.com");
 *   console.log(page.status, page.body.length);
 * } catch (error) {
 *   // FetchError or TimeoutError: no HTTP response at all
 * }
 * ```
 */
export class HttpPageFetcher implements PageFetcher {
  private readonly timeoutMs: number;
  private readonly maxResponseSize: number;
  private readonly userAgent: string;

  constructor(options: HttpFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? config.fetchTimeout;
    this.maxResponseSize = options.maxResponseSize ?? config.maxResponseSize;
    this.userAgent = options.userAgent ?? config.userAgent;
  }

  async fetch(url: string): Promise<PageResponse> {
    // -----------------------------------------------------------------------
    // Step 1: Parse the URL and validate the protocol
    // -----------------------------------------------------------------------

    let parsedUrl: URL;
    try {
      parsedUrl = new URL(url);
    } catch {
      throw new FetchError(`Invalid URL: ${url}`);
    }

    if (parsedUrl.protocol !== "http:" && parsedUrl.protocol !== "https:") {
      throw new FetchError(
        `Unsupported protocol: ${parsedUrl.protocol} (only http: and https: are allowed)`,
      );
    }

    // -----------------------------------------------------------------------
    // Step 2: Execute the request
    // -----------------------------------------------------------------------

    // The signal stays armed while the body streams, so a server that sends
    // headers and then stalls still times out.
    const signal = AbortSignal.timeout(this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(parsedUrl.href, {
        signal,
        headers: {
          "User-Agent": this.userAgent,
          Accept: "text/html, application/xhtml+xml, */*;q=0.1",
        },
        redirect: "follow",
      });
    } catch (error) {
      if (isAbortOrTimeout(error)) {
        throw new TimeoutError(`Request to ${url} timed out after ${this.timeoutMs}ms`);
      }
      throw new FetchError(`Failed to fetch ${url}: ${formatError(error)}`);
    }

    // -----------------------------------------------------------------------
    // Step 3: Read the body when it can contain links
    // -----------------------------------------------------------------------

    const contentType = response.headers.get("content-type");
    const readable = response.status < 400 && isHtmlContentType(contentType);

    let body = "";
    if (readable) {
      try {
        body = await readBodyWithLimit(response, this.maxResponseSize);
      } catch (error) {
        if (signal.aborted) {
          throw new TimeoutError(`Request to ${url} timed out after ${this.timeoutMs}ms`);
        }
        throw error;
      }
    } else if (response.body) {
      await response.body.cancel();
    }

    return {
      status: response.status,
      url: response.url || parsedUrl.href,
      contentType: contentType ?? "",
      body,
    };
  }
}
