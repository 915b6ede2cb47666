/**
 * @fileoverview HTTP fetch service for the crawler.
 *
 * Wraps the Node.js native `fetch()` with the controls the crawl engine
 * relies on, and converts every failure into a value instead of an
 * exception so one bad page can never unwind the crawl loop.
 *
 * ## Controls
 *
 * 1. **Timeout** - `AbortSignal.timeout()` per request; each fetch has its
 *    own clock, so a slow page never delays or cancels its siblings.
 * 2. **Cancellation** - an optional caller signal aborts the request and the
 *    body read.
 * 3. **Status check** - only 2xx responses count as success.
 * 4. **Response size limit** - streaming read with a byte counter.
 * 5. **User-Agent** - identifying header from the configuration.
 *
 * No retries: exactly one outbound request per call.
 *
 * ## Architecture
 *
 * ```
 *   fetchPage(url, options)
 *     |
 *     +--> requestPage()           throws typed errors
 *     |     - native fetch() + linked abort signals
 *     |     - status check
 *     |     - readBodyWithLimit()
 *     |
 *     +--> FetchOutcome            { ok: true, html } | { ok: false, error }
 * ```
 *
 * @module services/fetch
 */

import {
  CrawlAbortedError,
  FetchError,
  ResponseTooLargeError,
  TimeoutError,
} from "../utils/errors.js";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/**
 * Per-call fetch settings, usually filled from the crawler configuration.
 */
export interface FetchOptions {
  /** Request timeout in milliseconds. */
  timeoutMs: number;

  /** Value of the User-Agent header. */
  userAgent: string;

  /** Maximum body size in bytes. */
  maxResponseSize: number;

  /** Cancels the request when aborted. */
  signal?: AbortSignal;
}

/**
 * A page that was retrieved with a 2xx status.
 */
export interface FetchSuccess {
  ok: true;

  /** The raw body of the response. */
  html: string;

  /** The final URL after any redirects the HTTP layer followed. */
  url: string;

  /** HTTP status code of the final response. */
  statusCode: number;
}

/**
 * A page that could not be retrieved.
 */
export interface FetchFailure {
  ok: false;

  /**
   * Why the fetch failed. {@link TimeoutError} and
   * {@link ResponseTooLargeError} are subclasses of {@link FetchError};
   * {@link CrawlAbortedError} means the caller's signal fired.
   */
  error: FetchError | CrawlAbortedError;
}

export type FetchOutcome = FetchSuccess | FetchFailure;

/**
 * Signature of a page fetcher. The crawl engine accepts any implementation,
 * which is how tests substitute an in-memory site.
 */
export type PageFetcher = (
  url: string,
  options: FetchOptions,
) => Promise<FetchOutcome>;

// ---------------------------------------------------------------------------
// Helper Functions
// ---------------------------------------------------------------------------

/**
 * Reads a Response body as text with a size limit enforced via streaming.
 *
 * The Content-Length header is checked first when present, but the byte
 * counter during streaming is what enforces the limit.
 *
 * @throws {ResponseTooLargeError} If the body exceeds the size limit.
 */
async function readBodyWithLimit(
  response: Response,
  maxBytes: number,
): Promise<string> {
  const contentLength = response.headers.get("content-length");
  if (contentLength) {
    const declaredSize = parseInt(contentLength, 10);
    if (!Number.isNaN(declaredSize) && declaredSize > maxBytes) {
      throw new ResponseTooLargeError(
        `Response Content-Length (${declaredSize} bytes) exceeds limit of ${maxBytes} bytes`,
      );
    }
  }

  if (!response.body) {
    return "";
  }

  const reader = response.body.getReader();
  // Malformed byte sequences become U+FFFD instead of throwing.
  const decoder = new TextDecoder("utf-8", { fatal: false });

  const chunks: string[] = [];
  let totalBytes = 0;

  while (true) {
    const { done, value } = await reader.read();

    if (done) {
      break;
    }

    totalBytes += value.byteLength;

    if (totalBytes > maxBytes) {
      await reader.cancel();
      throw new ResponseTooLargeError(
        `Response body exceeds limit of ${maxBytes} bytes (read ${totalBytes} bytes so far)`,
      );
    }

    chunks.push(decoder.decode(value, { stream: true }));
  }

  chunks.push(decoder.decode());
  return chunks.join("");
}

/**
 * Translate anything thrown during a request into the fetch error taxonomy.
 *
 * The signals are inspected rather than the error's name, because runtimes
 * disagree on whether a timed-out fetch rejects with "AbortError" or
 * "TimeoutError".
 *
 * @internal
 */
function toFetchError(
  error: unknown,
  url: string,
  timeoutMs: number,
  timeoutSignal: AbortSignal,
  callerSignal: AbortSignal | undefined,
): FetchError | CrawlAbortedError {
  if (error instanceof FetchError || error instanceof CrawlAbortedError) {
    return error;
  }

  if (callerSignal?.aborted) {
    return new CrawlAbortedError(`Request to ${url} was cancelled`);
  }

  if (timeoutSignal.aborted) {
    return new TimeoutError(`Request to ${url} timed out after ${timeoutMs}ms`);
  }

  return new FetchError(
    `Failed to fetch ${url}: ${error instanceof Error ? error.message : String(error)}`,
  );
}

/**
 * Perform the request. Throws on every failure.
 *
 * @internal
 */
async function requestPage(
  url: string,
  options: FetchOptions,
  signal: AbortSignal,
): Promise<FetchSuccess> {
  const response = await fetch(url, {
    signal,
    headers: {
      "User-Agent": options.userAgent,
      Accept: "text/html, application/xhtml+xml, */*;q=0.1",
    },
    redirect: "follow",
  });

  if (!response.ok) {
    // Release the connection; the body is not needed.
    await response.body?.cancel();
    const status = response.statusText
      ? `${response.status} ${response.statusText}`
      : `${response.status}`;
    throw new FetchError(`HTTP ${status} for ${url}`, response.status);
  }

  const html = await readBodyWithLimit(response, options.maxResponseSize);

  return {
    ok: true,
    html,
    url: response.url || url,
    statusCode: response.status,
  };
}

// ---------------------------------------------------------------------------
// Main Export
// ---------------------------------------------------------------------------

/**
 * Fetch one page with a timeout, reporting success or failure as a value.
 *
 * Never rejects. Failures come back as `{ ok: false, error }` with:
 * - {@link TimeoutError} - the request exceeded `options.timeoutMs`
 * - {@link FetchError} - network failure or non-2xx status (`statusCode` set)
 * - {@link ResponseTooLargeError} - body exceeded `options.maxResponseSize`
 * - {@link CrawlAbortedError} - `options.signal` fired
 *
 * @example
 * ```typescript
 * const outcome = await fetchPage("https://en.wikipedia.org/wiki/Cat", {
 *   timeoutMs: 10000,
 *   userAgent: "wiki-crawler/1.0",
 *   maxResponseSize: 10485760,
 * });
 *
 * if (outcome.ok) {
 *   console.log(`Fetched ${outcome.url} (${outcome.html.length} chars)`);
 * } else {
 *   console.error(outcome.error.message);
 * }
 * ```
 */
export async function fetchPage(
  url: string,
  options: FetchOptions,
): Promise<FetchOutcome> {
  const callerSignal = options.signal;
  if (callerSignal?.aborted) {
    return {
      ok: false,
      error: new CrawlAbortedError(`Request to ${url} was cancelled`),
    };
  }

  // One controller links the per-request timeout with the caller's signal.
  const timeoutSignal = AbortSignal.timeout(options.timeoutMs);
  const controller = new AbortController();
  const abort = (): void => controller.abort();
  timeoutSignal.addEventListener("abort", abort, { once: true });
  callerSignal?.addEventListener("abort", abort, { once: true });

  try {
    return await requestPage(url, options, controller.signal);
  } catch (error: unknown) {
    return {
      ok: false,
      error: toFetchError(
        error,
        url,
        options.timeoutMs,
        timeoutSignal,
        callerSignal,
      ),
    };
  } finally {
    timeoutSignal.removeEventListener("abort", abort);
    callerSignal?.removeEventListener("abort", abort);
  }
}
