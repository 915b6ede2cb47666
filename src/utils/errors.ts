/**
 * @module utils/errors
 * @fileoverview Custom error class hierarchy for wiki-crawler.
 *
 * Every error raised by the crawler extends {@link CrawlerError}, which
 * carries a machine-readable `code` alongside the human-readable `message`.
 *
 * ## Error Hierarchy
 * ```
 * Error (built-in)
 *   └── CrawlerError (base)  ─── code: string
 *         ├── ValidationError         ─── "INVALID_INPUT"
 *         ├── FetchError              ─── "FETCH_FAILED" + optional statusCode
 *         │     ├── TimeoutError          ─── "TIMEOUT"
 *         │     └── ResponseTooLargeError ─── "RESPONSE_TOO_LARGE"
 *         └── CrawlAbortedError       ─── "CRAWL_ABORTED"
 * ```
 *
 * Only {@link ValidationError} and {@link CrawlAbortedError} ever end a run.
 * Fetch failures are recorded against a single page and the crawl carries
 * on.
 *
 * @example
 * ```ts
 * import { FetchError, formatError } from "./utils/errors.js";
 *
 * formatError(new FetchError("HTTP 503 Service Unavailable", 503));
 * // => "[FETCH_FAILED] HTTP 503 Service Unavailable"
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error Class
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Root of the crawler's error hierarchy.
 */
export class CrawlerError extends Error {
  /**
   * Machine-readable error code in SCREAMING_SNAKE_CASE.
   *
   * @example "FETCH_FAILED", "TIMEOUT"
   */
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Specific Error Types
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Thrown when the seed URL or the requested depth is rejected.
 *
 * Always raised before any network activity.
 *
 * @example
 * ```ts
 * throw new ValidationError("Depth must be an integer between 1 and 3");
 * ```
 */
export class ValidationError extends CrawlerError {
  constructor(message: string) {
    super(message, "INVALID_INPUT");
  }
}

/**
 * A page could not be retrieved: network failure or a non-2xx status.
 */
export class FetchError extends CrawlerError {
  /**
   * HTTP status code, when the server answered at all.
   */
  public readonly statusCode?: number;

  /**
   * @param message    - Description of the fetch failure.
   * @param statusCode - HTTP status code, if available.
   * @param code       - Overridden by subclasses.
   */
  constructor(message: string, statusCode?: number, code = "FETCH_FAILED") {
    super(message, code);
    this.statusCode = statusCode;
  }
}

/**
 * The request did not complete within the configured timeout.
 *
 * @example
 * ```ts
 * throw new TimeoutError(
 *   "Request to https://en.wikipedia.org/wiki/Cat timed out after 10000ms"
 * );
 * ```
 */
export class TimeoutError extends FetchError {
  constructor(message: string) {
    super(message, undefined, "TIMEOUT");
  }
}

/**
 * The response body grew past the configured byte limit.
 */
export class ResponseTooLargeError extends FetchError {
  constructor(message: string) {
    super(message, undefined, "RESPONSE_TOO_LARGE");
  }
}

/**
 * The crawl was cancelled through its abort signal.
 */
export class CrawlAbortedError extends CrawlerError {
  constructor(message = "Crawl aborted") {
    super(message, "CRAWL_ABORTED");
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Render any thrown value as a single line for logs and the terminal.
 *
 * - {@link CrawlerError}: `"[CODE] message"`
 * - Other `Error`: its message
 * - Anything else: `String(value)`
 *
 * @example
 * ```ts
 * formatError(new TimeoutError("Timed out after 10000ms"));
 * // => "[TIMEOUT] Timed out after 10000ms"
 *
 * formatError(new TypeError("Cannot read properties of undefined"));
 * // => "Cannot read properties of undefined"
 *
 * formatError("something went wrong");
 * // => "something went wrong"
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof CrawlerError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
