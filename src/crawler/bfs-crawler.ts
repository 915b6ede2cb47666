/**
 * @module crawler/bfs-crawler
 * @fileoverview Level-bounded BFS (Breadth-First Search) crawl engine.
 *
 * ## Algorithm Overview
 *
 * ```
 *   seed (level 0)
 *      |
 *      v
 *   [Frontier: level N] --all fetched via FetchPool--> [Outcomes, frontier order]
 *      ^                                                      |
 *      |                                                      v
 *      +---- level N+1 <-- new links (visited check) <-- [extractArticleLinks]
 *
 *   stop when the frontier is empty or its level equals the requested depth
 * ```
 *
 * Depth is an *expansion* limit: pages at `level === depth` are recorded
 * when discovered but never fetched. A depth-1 crawl therefore fetches only
 * the seed and records the seed plus its direct links.
 *
 * ## Ordering
 * A whole level is fetched before its outcomes are merged, and they are
 * merged in frontier order. The resulting discovery order is identical to a
 * one-page-at-a-time crawl, whatever `maxConcurrent` is set to. The visited
 * set and the result list are only touched by the merge step, which runs on
 * a single async path.
 *
 * ## Error Handling Strategy
 * A failed fetch (network error, timeout, non-2xx, oversized body) is logged
 * to stderr, recorded in `failures`, and prunes only that node's subtree.
 * Unparsable markup yields no links. Only invalid input
 * ({@link ValidationError}) and cancellation ({@link CrawlAbortedError})
 * end a crawl early.
 *
 * ## Architecture Position
 * ```
 *   index (CLI)  -->  bfs-crawler  (this file)
 *                          |
 *                          +-->  services/fetch   (fetchPage)
 *                          +-->  services/queue   (FetchPool)
 *                          +-->  link-resolver    (extractArticleLinks)
 *                          +-->  utils/url        (isValidArticleUrl, canonicalizeSeed)
 * ```
 *
 * @example
 * ```ts
 * import { BfsCrawler } from "./bfs-crawler.js";
 * import { config } from "../config.js";
 *
 * const crawler = new BfsCrawler(config);
 * const result = await crawler.crawl("https://en.wikipedia.org/wiki/Cat", 2);
 *
 * console.log(result.summary);
 * // { total_links_found: 111, unique_links: 111, pages_fetched: 11,
 * //   pages_failed: 0, max_level_reached: 2 }
 * ```
 */

import type { CrawlerConfig } from "../config.js";
import { extractArticleLinks } from "./link-resolver.js";
import {
  fetchPage,
  type FetchOutcome,
  type PageFetcher,
} from "../services/fetch.js";
import { FetchPool } from "../services/queue.js";
import { canonicalizeSeed, isValidArticleUrl } from "../utils/url.js";
import {
  CrawlAbortedError,
  ValidationError,
  formatError,
} from "../utils/errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Options for a single crawl run.
 */
export interface CrawlOptions {
  /**
   * Cancels the crawl. In-flight fetches are aborted and `crawl` rejects
   * with {@link CrawlAbortedError}; no partial result is returned.
   */
  signal?: AbortSignal;
}

/**
 * A pending work item: a URL and its BFS distance from the seed.
 */
export interface FrontierEntry {
  url: string;

  /** Seed is level 0, its direct links level 1, and so on. */
  level: number;
}

/**
 * A URL recorded in the crawl result.
 */
export type DiscoveredPage = FrontierEntry;

/**
 * A page whose fetch failed. Its links were never followed.
 */
export interface FailedPage {
  url: string;
  level: number;

  /** Error code, e.g. `"TIMEOUT"` or `"FETCH_FAILED"`. */
  code: string;

  /** Human-readable cause. */
  reason: string;
}

/**
 * Complete result of a BFS crawl.
 */
export interface CrawlResult {
  /** Canonical seed URL (fragment removed). */
  seed: string;

  /** Requested depth. */
  depth: number;

  /**
   * Every discovered URL in discovery order, seed first.
   */
  pages: DiscoveredPage[];

  /** Pages whose fetch failed, in the order they were attempted. */
  failures: FailedPage[];

  summary: {
    /** Equals `pages.length`. */
    total_links_found: number;

    /**
     * Number of distinct URLs in `pages`, counted rather than assumed. It
     * equals `total_links_found` because the visited set admits each URL
     * once.
     */
    unique_links: number;

    /** Pages fetched successfully. */
    pages_fetched: number;

    /** Pages whose fetch failed. */
    pages_failed: number;

    /** Deepest level present in `pages`. */
    max_level_reached: number;
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Crawl Engine
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Breadth-first crawler bound to one {@link CrawlerConfig}.
 *
 * The fetcher is injectable; it defaults to {@link fetchPage}.
 *
 * @example
 * ```ts
 * const crawler = new BfsCrawler({ ...config, maxConcurrent: 4 });
 * const { pages } = await crawler.crawl(seed, 1);
 * ```
 */
export class BfsCrawler {
  private readonly config: CrawlerConfig;

  private readonly fetcher: PageFetcher;

  constructor(config: CrawlerConfig, fetcher: PageFetcher = fetchPage) {
    this.config = config;
    this.fetcher = fetcher;
  }

  /**
   * Validate a seed URL and a depth before any network activity.
   *
   * @returns The canonical seed.
   * @throws {ValidationError} On an out-of-scope URL or out-of-range depth.
   */
  validate(seed: string, depth: number): string {
    const { site, minDepth, maxDepth } = this.config;

    if (!isValidArticleUrl(seed, site)) {
      throw new ValidationError(
        `URL must be a valid ${site.domain}/${site.articlePrefix}/... link: ${seed}`,
      );
    }

    if (!Number.isInteger(depth) || depth < minDepth || depth > maxDepth) {
      throw new ValidationError(
        `Depth must be an integer between ${minDepth} and ${maxDepth}`,
      );
    }

    return canonicalizeSeed(seed);
  }

  /**
   * Run a breadth-first crawl from `seed`, expanding pages up to `depth`
   * levels away.
   *
   * ## Algorithm Steps
   * 1. visited = {seed}; frontier = [(seed, 0)]; pages = [seed].
   * 2. While the frontier is non-empty and its level is below `depth`:
   *    a. Fetch every frontier entry through the pool.
   *    b. In frontier order: log and record failures; for each success,
   *       extract links and append every unvisited one to `pages` and to
   *       the next frontier at level + 1.
   * 3. Return the pages, failures and summary.
   *
   * @throws {ValidationError} Before any fetch, on invalid input.
   * @throws {CrawlAbortedError} When `options.signal` aborts. Fetches still
   *   queued for the current level are dropped and never started.
   */
  async crawl(
    seed: string,
    depth: number,
    options: CrawlOptions = {},
  ): Promise<CrawlResult> {
    const start = this.validate(seed, depth);
    const { signal } = options;
    throwIfAborted(signal);

    const pool = new FetchPool(this.config.maxConcurrent);
    const clearPool = (): void => pool.clear();
    signal?.addEventListener("abort", clearPool, { once: true });

    try {
      return await this.traverse(start, depth, pool, signal);
    } finally {
      signal?.removeEventListener("abort", clearPool);
    }
  }

  /**
   * The level loop of {@link BfsCrawler.crawl}, run on a pool the caller
   * owns.
   */
  private async traverse(
    start: string,
    depth: number,
    pool: FetchPool,
    signal: AbortSignal | undefined,
  ): Promise<CrawlResult> {
    const visited = new Set<string>([start]);
    const pages: DiscoveredPage[] = [{ url: start, level: 0 }];
    const failures: FailedPage[] = [];
    let pagesFetched = 0;

    // Every entry in a frontier shares the same level.
    let frontier: FrontierEntry[] = [{ url: start, level: 0 }];
    let level = 0;

    while (frontier.length > 0) {
      // Entries at the depth limit are recorded already; nothing is fetched from them.
      if (level >= depth) {
        break;
      }

      const outcomes: FetchOutcome[] = await pool.runAll(frontier, (entry) =>
        this.fetcher(entry.url, {
          timeoutMs: this.config.fetchTimeout,
          userAgent: this.config.userAgent,
          maxResponseSize: this.config.maxResponseSize,
          signal,
        }),
        signal,
      );
      throwIfAborted(signal);

      const next: FrontierEntry[] = [];

      frontier.forEach((entry, index) => {
        const outcome = outcomes[index];
        if (outcome === undefined) {
          return;
        }

        if (!outcome.ok) {
          console.error(
            `[bfs-crawler] Could not fetch ${entry.url}: ${formatError(outcome.error)}`,
          );
          failures.push({
            url: entry.url,
            level: entry.level,
            code: outcome.error.code,
            reason: outcome.error.message,
          });
          return;
        }

        pagesFetched += 1;

        const links = extractArticleLinks(
          outcome.html,
          this.config.site,
          this.config.maxLinksPerPage,
        );

        for (const link of links) {
          if (visited.has(link)) {
            continue;
          }
          visited.add(link);
          pages.push({ url: link, level: entry.level + 1 });
          next.push({ url: link, level: entry.level + 1 });
        }
      });

      frontier = next;
      level += 1;
    }

    return {
      seed: start,
      depth,
      pages,
      failures,
      summary: {
        total_links_found: pages.length,
        unique_links: new Set(pages.map((page) => page.url)).size,
        pages_fetched: pagesFetched,
        pages_failed: failures.length,
        max_level_reached: pages.reduce(
          (max, page) => Math.max(max, page.level),
          0,
        ),
      },
    };
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * @throws {CrawlAbortedError} If the signal has fired.
 *
 * @internal
 */
function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CrawlAbortedError();
  }
}

/**
 * URLs of a crawl result in discovery order.
 */
export function resultLinks(result: CrawlResult): string[] {
  return result.pages.map((page) => page.url);
}
