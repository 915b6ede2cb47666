/**
 * @module utils/url
 * @fileoverview URL utilities: article validation, seed canonicalisation and
 * relative resolution.
 *
 * An article URL is the only kind of URL the crawler ever queues or
 * records. The article path rule is the same one the link extractor applies
 * to raw hrefs, so both sides agree on what a "page" is.
 *
 * ## Article URL Rules
 * 1. Scheme is `http:` or `https:`.
 * 2. Hostname equals the site domain or is a subdomain of it.
 * 3. Path matches `^/<prefix>/[^:#]+$`: no colon-qualified namespace
 *    (`Special:`, `File:`, `Talk:`, `Category:`), no fragment marker and a
 *    non-empty title.
 *
 * @example
 * ```ts
 * import { isValidArticleUrl } from "./utils/url.js";
 *
 * isValidArticleUrl("https://en.wikipedia.org/wiki/Cat");          // true
 * isValidArticleUrl("https://en.wikipedia.org/wiki/Special:Random"); // false
 * isValidArticleUrl("ftp://en.wikipedia.org/wiki/Cat");            // false
 * ```
 */

import { config, type SiteConfig } from "../config.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Default ports for HTTP and HTTPS, stripped during canonicalisation.
 */
const DEFAULT_PORTS: ReadonlyMap<string, string> = new Map([
  ["http:", "80"],
  ["https:", "443"],
]);

/**
 * Schemes the fetcher can retrieve.
 */
const FETCHABLE_SCHEMES: ReadonlySet<string> = new Set(["http:", "https:"]);

/* ────────────────────────────────────────────────────────────────────────────
 * Article Path Pattern
 * ──────────────────────────────────────────────────────────────────────────── */

/** Compiled patterns keyed by article prefix. */
const patternCache = new Map<string, RegExp>();

/**
 * Build (or reuse) the article path pattern for a site.
 *
 * The prefix is regex-escaped, so a prefix such as `w.iki` matches only
 * literally.
 *
 * @example
 * ```ts
 * articlePathPattern({ ...site, articlePrefix: "wiki" });
 * // => /^\/wiki\/[^:#]+$/
 * ```
 */
export function articlePathPattern(site: SiteConfig = config.site): RegExp {
  const cached = patternCache.get(site.articlePrefix);
  if (cached) {
    return cached;
  }

  const escaped = site.articlePrefix.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
  const pattern = new RegExp(`^\\/${escaped}\\/[^:#]+$`);
  patternCache.set(site.articlePrefix, pattern);
  return pattern;
}

/**
 * Test a raw path or href against the article path pattern.
 *
 * No URL parsing happens here: `"/wiki/Cat#Diet"` is rejected because the
 * fragment marker is still part of the string.
 */
export function matchesArticlePath(
  path: string,
  site: SiteConfig = config.site,
): boolean {
  return articlePathPattern(site).test(path);
}

/* ────────────────────────────────────────────────────────────────────────────
 * Domain Matching
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Whether `hostname` is the site domain or one of its subdomains.
 *
 * The subdomain check requires a dot boundary, so `notwikipedia.org` is not
 * part of `wikipedia.org`.
 *
 * @example
 * ```ts
 * isSiteHost("en.wikipedia.org", "wikipedia.org");  // true
 * isSiteHost("wikipedia.org", "wikipedia.org");     // true
 * isSiteHost("notwikipedia.org", "wikipedia.org");  // false
 * ```
 */
export function isSiteHost(hostname: string, domain: string): boolean {
  const host = hostname.toLowerCase();
  const suffix = domain.toLowerCase();
  return host === suffix || host.endsWith(`.${suffix}`);
}

/* ────────────────────────────────────────────────────────────────────────────
 * Validation
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Decide whether a URL is an in-scope, crawlable article link.
 *
 * Never throws: malformed or empty input yields `false`.
 *
 * @param url  - Absolute URL to check.
 * @param site - Site the URL must belong to.
 *
 * @example
 * ```ts
 * isValidArticleUrl("https://en.wikipedia.org/wiki/Cat");              // true
 * isValidArticleUrl("https://en.wikipedia.org/wiki/File:Cat.jpg");     // false
 * isValidArticleUrl("https://example.com/wiki/Cat");                   // false
 * isValidArticleUrl("");                                               // false
 * ```
 */
export function isValidArticleUrl(
  url: string,
  site: SiteConfig = config.site,
): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }

  return (
    FETCHABLE_SCHEMES.has(parsed.protocol) &&
    isSiteHost(parsed.hostname, site.domain) &&
    matchesArticlePath(parsed.pathname, site)
  );
}

/* ────────────────────────────────────────────────────────────────────────────
 * Canonicalisation & Resolution
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Canonical form of a seed URL.
 *
 * Removes the fragment and a redundant default port, and lowercases scheme
 * and host (the URL constructor does the latter). Links extracted from pages
 * are already in this form, so a back link to the seed deduplicates.
 *
 * @throws {TypeError} If the input is not a valid URL.
 *
 * @example
 * ```ts
 * canonicalizeSeed("HTTPS://EN.Wikipedia.org:443/wiki/Cat#History");
 * // => "https://en.wikipedia.org/wiki/Cat"
 * ```
 */
export function canonicalizeSeed(url: string): string {
  const parsed = new URL(url);
  parsed.hash = "";

  if (parsed.port === DEFAULT_PORTS.get(parsed.protocol)) {
    parsed.port = "";
  }

  return parsed.toString();
}

/**
 * Resolve a potentially relative URL against a base URL.
 *
 * @throws {TypeError} If the pair does not form a valid URL.
 *
 * @example
 * ```ts
 * resolveUrl("https://en.wikipedia.org", "/wiki/Dog");
 * // => "https://en.wikipedia.org/wiki/Dog"
 * ```
 */
export function resolveUrl(base: string, relative: string): string {
  return new URL(relative, base).href;
}
