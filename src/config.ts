/**
 * @module config
 * @fileoverview Crawler configuration loaded from environment variables.
 *
 * Every tunable the crawl engine, fetcher and link extractor need lives in a
 * single {@link CrawlerConfig} value. The engine receives that value at
 * construction time, so tests can point it at another site or a smaller
 * fan-out cap without touching process-wide state.
 *
 * ## Environment Variable Naming Convention
 * - All uppercase with underscores (SCREAMING_SNAKE_CASE).
 * - Numeric values are parsed with `parseInt(..., 10)`.
 * - A missing, non-numeric or non-positive number falls back to its default.
 *
 * @example
 * ```ts
 * import { config } from "./config.js";
 * config.fetchTimeout; // 10000
 *
 * const testConfig = loadConfig({ MAX_LINKS_PER_PAGE: "3" });
 * testConfig.maxLinksPerPage; // 3
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Describes the single site being crawled and how its article URLs look.
 */
export interface SiteConfig {
  /**
   * Registrable domain every crawled host must equal or be a subdomain of.
   *
   * @default "wikipedia.org"
   */
  domain: string;

  /**
   * Origin that relative article hrefs are resolved against.
   *
   * @default "https://en.wikipedia.org"
   */
  baseUrl: string;

  /**
   * First path segment of an article URL, without slashes.
   *
   * @default "wiki"
   */
  articlePrefix: string;
}

/**
 * Complete crawler configuration.
 *
 * Every field is required and has a default.
 */
export interface CrawlerConfig {
  site: SiteConfig;

  /**
   * Maximum number of distinct article links kept from one page.
   *
   * Bounds frontier growth: a depth-3 crawl touches at most
   * 1 + 10 + 100 + 1000 URLs.
   *
   * @default 10
   */
  maxLinksPerPage: number;

  /**
   * HTTP request timeout in milliseconds, applied to each fetch on its own.
   *
   * @default 10000
   */
  fetchTimeout: number;

  /**
   * Number of pages of the same BFS level fetched in parallel.
   *
   * `1` reproduces a strictly sequential crawl.
   *
   * @default 1
   */
  maxConcurrent: number;

  /**
   * Maximum allowed response body size in bytes.
   *
   * @default 10485760
   */
  maxResponseSize: number;

  /**
   * User-Agent header sent with every outbound request.
   *
   * @default "wiki-crawler/1.0 (article crawler)"
   */
  userAgent: string;

  /** Smallest depth a crawl accepts. */
  minDepth: number;

  /** Largest depth a crawl accepts. */
  maxDepth: number;
}

/** Environment shape read by {@link loadConfig}. */
export type ConfigEnv = Record<string, string | undefined>;

/* ────────────────────────────────────────────────────────────────────────────
 * Config Loader
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Parse a positive integer, returning `fallback` for anything else.
 *
 * @internal
 */
function readPositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

/**
 * Read environment variables and build a complete {@link CrawlerConfig}.
 *
 * Pure with respect to its argument: pass an explicit object in tests
 * instead of mutating `process.env`.
 *
 * @param env - Variables to read. Defaults to `process.env`.
 */
export function loadConfig(env: ConfigEnv = process.env): CrawlerConfig {
  return {
    site: {
      domain: (env.SITE_DOMAIN ?? "wikipedia.org").toLowerCase(),
      baseUrl: env.SITE_BASE_URL ?? "https://en.wikipedia.org",
      // Slashes around the prefix are tolerated: "/wiki/" and "wiki" are equal.
      articlePrefix: (env.ARTICLE_PATH_PREFIX ?? "wiki").replace(/^\/+|\/+$/g, ""),
    },
    maxLinksPerPage: readPositiveInt(env.MAX_LINKS_PER_PAGE, 10),
    fetchTimeout: readPositiveInt(env.FETCH_TIMEOUT, 10000),
    maxConcurrent: readPositiveInt(env.MAX_CONCURRENT, 1),
    maxResponseSize: readPositiveInt(env.MAX_RESPONSE_SIZE, 10485760),
    userAgent: env.USER_AGENT ?? "wiki-crawler/1.0 (article crawler)",
    minDepth: 1,
    maxDepth: 3,
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Singleton Export
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Configuration snapshot taken once at module load time.
 *
 * Call {@link loadConfig} directly for a fresh value.
 */
export const config: CrawlerConfig = loadConfig();
