/**
 * @module crawler/link-resolver
 * @fileoverview Article link extraction for the BFS crawler.
 *
 * Given the raw HTML of a fetched page, this module finds the same-site
 * article links it contains, resolves them to absolute URLs and hands back
 * at most `maxLinks` of them in document order.
 *
 * ## Filtering Rules
 * An `<a href>` is kept only when:
 *   1. the href *as written in the markup* matches the article path pattern
 *      (`/wiki/Title`, no colon, no `#`);
 *   2. its resolved URL has not already been kept from this page;
 *   3. its resolution against the site base URL is a valid article URL.
 *
 * Absolute hrefs (`https://...`), protocol-relative hrefs (`//...`),
 * in-page anchors and namespaced pages all fail rule 1 and are skipped
 * without a log line.
 *
 * ## Architecture Position
 * ```
 *   bfs-crawler  -->  link-resolver  (this file)
 *                          |
 *                          +-->  utils/url  (matchesArticlePath, resolveUrl, ...)
 * ```
 *
 * @example
 * ```ts
 * import { extractArticleLinks } from "./link-resolver.js";
 *
 * const html = '<a href="/wiki/Dog">Dog</a><a href="#top">Top</a>';
 * extractArticleLinks(html, config.site);
 * // => ["https://en.wikipedia.org/wiki/Dog"]
 * ```
 */

import * as cheerio from "cheerio";
import { config, type SiteConfig } from "../config.js";
import {
  isValidArticleUrl,
  matchesArticlePath,
  resolveUrl,
} from "../utils/url.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Per-page fan-out cap used when the caller does not pass one.
 */
export const DEFAULT_MAX_LINKS = 10;

/* ────────────────────────────────────────────────────────────────────────────
 * Link Extraction
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Extract up to `maxLinks` distinct article links from a page.
 *
 * Pure: the same input always yields the same output and nothing outside
 * the call is touched. Empty markup yields `[]`;
 * malformed markup yields whatever links survive recovery.
 *
 * @param html     - Raw markup of the fetched page.
 * @param site     - Site whose article links are wanted.
 * @param maxLinks - Fan-out cap; scanning stops once this many are kept.
 * @returns Absolute article URLs, first-seen order, no duplicates.
 *
 * @example
 * ```ts
 * const html = `
 *   <a href="/wiki/Lion">Lion</a>
 *   <a href="/wiki/Tiger">Tiger</a>
 *   <a href="/wiki/Lion">Lion again</a>
 *   <a href="/wiki/Help:Contents">Help</a>
 * `;
 * extractArticleLinks(html, config.site);
 * // => [
 * //   "https://en.wikipedia.org/wiki/Lion",
 * //   "https://en.wikipedia.org/wiki/Tiger",
 * // ]
 * ```
 */
export function extractArticleLinks(
  html: string,
  site: SiteConfig = config.site,
  maxLinks: number = DEFAULT_MAX_LINKS,
): string[] {
  if (html.length === 0 || maxLinks <= 0) {
    return [];
  }

  // cheerio recovers from broken markup the way a browser does.
  const $ = cheerio.load(html);

  const seen = new Set<string>();
  const links: string[] = [];

  $("a[href]").each((_index, element) => {
    const href = $(element).attr("href");

    if (href === undefined || !matchesArticlePath(href, site)) {
      return; // cheerio's .each() treats `return` like `continue`
    }

    let absoluteUrl: string;
    try {
      absoluteUrl = resolveUrl(site.baseUrl, href);
    } catch {
      // A malformed base URL in the configuration; nothing on this page resolves.
      return false;
    }

    if (seen.has(absoluteUrl) || !isValidArticleUrl(absoluteUrl, site)) {
      return;
    }

    seen.add(absoluteUrl);
    links.push(absoluteUrl);

    // Returning false stops cheerio's iteration.
    if (links.length >= maxLinks) {
      return false;
    }
    return;
  });

  return links;
}
