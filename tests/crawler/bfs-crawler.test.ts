/**
 * @fileoverview Tests for the BFS crawl engine.
 *
 * The engine runs against an in-memory site: a map from article title to
 * the hrefs its page contains. The injected fetcher renders those hrefs as
 * anchors and records every URL it is asked for.
 */

import { afterAll, afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig, type CrawlerConfig } from "../../src/config.js";
import {
  BfsCrawler,
  resultLinks,
  type CrawlResult,
} from "../../src/crawler/bfs-crawler.js";
import type { FetchOutcome, PageFetcher } from "../../src/services/fetch.js";
import {
  CrawlAbortedError,
  TimeoutError,
  ValidationError,
} from "../../src/utils/errors.js";

const BASE = "https://en.wikipedia.org/wiki/";
const wiki = (title: string): string => `${BASE}${title}`;

type SiteGraph = Record<string, string[]>;

interface FakeSiteOptions {
  /** Titles whose fetch times out. */
  failing?: string[];
  /** Per-title response delay in milliseconds. */
  delays?: Record<string, number>;
  /** Called before each response is produced. */
  onFetch?: (url: string) => void;
}

function renderPage(hrefs: string[]): string {
  return `<html><body>${hrefs.map((href) => `<a href="${href}">link</a>`).join("")}</body></html>`;
}

/**
 * Build a fetcher over an in-memory site. Plain titles in the graph become
 * `/wiki/<title>` hrefs; entries starting with `/`, `#` or a scheme are used
 * as written.
 */
function fakeSite(graph: SiteGraph, options: FakeSiteOptions = {}) {
  const fetched: string[] = [];
  const failing = new Set(options.failing ?? []);

  const fetcher: PageFetcher = async (url): Promise<FetchOutcome> => {
    fetched.push(url);
    options.onFetch?.(url);
    const title = url.startsWith(BASE) ? url.slice(BASE.length) : url;

    const delay = options.delays?.[title] ?? 0;
    if (delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }

    if (failing.has(title)) {
      return {
        ok: false,
        error: new TimeoutError(`Request to ${url} timed out after 10000ms`),
      };
    }

    const hrefs = (graph[title] ?? []).map((entry) =>
      /^(\/|#|[a-z]+:)/.test(entry) ? entry : `/wiki/${entry}`,
    );
    return { ok: true, html: renderPage(hrefs), url, statusCode: 200 };
  };

  return { fetcher, fetched };
}

const baseConfig: CrawlerConfig = loadConfig({});

function levelsOf(result: CrawlResult): number[] {
  return result.pages.map((page) => page.level);
}

const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

afterEach(() => {
  errorSpy.mockClear();
});

afterAll(() => {
  errorSpy.mockRestore();
});

// ---------------------------------------------------------------------------
// Depth 1
// ---------------------------------------------------------------------------

describe("BfsCrawler — depth 1", () => {
  it("records the seed and its in-scope links, skipping an anchor and an off-domain link", async () => {
    const { fetcher, fetched } = fakeSite({
      Cat: [
        "Felidae",
        "#History",
        "Whiskers",
        "https://example.com/wiki/Dog",
        "Kitten",
      ],
    });

    const result = await new BfsCrawler(baseConfig, fetcher).crawl(wiki("Cat"), 1);

    expect(resultLinks(result)).toEqual([
      wiki("Cat"),
      wiki("Felidae"),
      wiki("Whiskers"),
      wiki("Kitten"),
    ]);
    expect(levelsOf(result)).toEqual([0, 1, 1, 1]);
    expect(fetched).toEqual([wiki("Cat")]);
  });

  it("records at most ten direct links and fetches nothing beyond the seed", async () => {
    const titles = Array.from({ length: 12 }, (_, i) => `T${i + 1}`);
    const { fetcher, fetched } = fakeSite({ Cat: titles, T1: ["Deep"] });

    const result = await new BfsCrawler(baseConfig, fetcher).crawl(wiki("Cat"), 1);

    expect(result.pages).toHaveLength(11);
    expect(resultLinks(result)).not.toContain(wiki("Deep"));
    expect(fetched).toEqual([wiki("Cat")]);
    expect(result.summary.max_level_reached).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Depth 2 and beyond
// ---------------------------------------------------------------------------

describe("BfsCrawler — deeper crawls", () => {
  const graph: SiteGraph = {
    Cat: ["A", "B"],
    A: ["A1", "A2", "Cat"],
    B: ["B1", "B2", "Cat"],
    A1: ["Deep"],
  };

  it("excludes back links to the seed and records seven pages at depth 2", async () => {
    const { fetcher, fetched } = fakeSite(graph);

    const result = await new BfsCrawler(baseConfig, fetcher).crawl(wiki("Cat"), 2);

    expect(resultLinks(result)).toEqual(
      ["Cat", "A", "B", "A1", "A2", "B1", "B2"].map(wiki),
    );
    expect(levelsOf(result)).toEqual([0, 1, 1, 2, 2, 2, 2]);
    expect(fetched).toEqual(["Cat", "A", "B"].map(wiki));
    expect(result.summary).toEqual({
      total_links_found: 7,
      unique_links: 7,
      pages_fetched: 3,
      pages_failed: 0,
      max_level_reached: 2,
    });
  });

  it("expands level 2 pages at depth 3", async () => {
    const { fetcher, fetched } = fakeSite(graph);

    const result = await new BfsCrawler(baseConfig, fetcher).crawl(wiki("Cat"), 3);

    expect(resultLinks(result).at(-1)).toBe(wiki("Deep"));
    expect(result.pages.at(-1)?.level).toBe(3);
    expect(fetched).toEqual(["Cat", "A", "B", "A1", "A2", "B1", "B2"].map(wiki));
  });

  it("fetches a page linked from several parents only once", async () => {
    const { fetcher, fetched } = fakeSite({
      Cat: ["A", "B"],
      A: ["Shared"],
      B: ["Shared", "A"],
      Shared: ["Cat", "A", "B"],
    });

    const result = await new BfsCrawler(baseConfig, fetcher).crawl(wiki("Cat"), 3);

    expect(resultLinks(result)).toEqual(["Cat", "A", "B", "Shared"].map(wiki));
    expect(fetched).toEqual(["Cat", "A", "B", "Shared"].map(wiki));
    expect(new Set(fetched).size).toBe(fetched.length);
  });

  it("stores the seed without its fragment so back links deduplicate", async () => {
    const { fetcher } = fakeSite({ Cat: ["A"], A: ["Cat"] });

    const result = await new BfsCrawler(baseConfig, fetcher).crawl(
      `${wiki("Cat")}#History`,
      2,
    );

    expect(result.seed).toBe(wiki("Cat"));
    expect(resultLinks(result)).toEqual([wiki("Cat"), wiki("A")]);
  });
});

// ---------------------------------------------------------------------------
// Structural properties
// ---------------------------------------------------------------------------

describe("BfsCrawler — properties", () => {
  // Every page links to the next three in a ring of twenty.
  const ring: SiteGraph = Object.fromEntries(
    Array.from({ length: 20 }, (_, i): [string, string[]] => [
      `N${i}`,
      [1, 2, 3].map((step) => `N${(i + step) % 20}`),
    ]),
  );

  it("never records a URL twice", async () => {
    const { fetcher } = fakeSite(ring);

    const result = await new BfsCrawler(baseConfig, fetcher).crawl(wiki("N0"), 3);
    const links = resultLinks(result);

    expect(new Set(links).size).toBe(links.length);
    expect(result.summary.unique_links).toBe(result.summary.total_links_found);
  });

  it("records pages level by level", async () => {
    const { fetcher } = fakeSite(ring);

    const result = await new BfsCrawler(baseConfig, fetcher).crawl(wiki("N0"), 3);
    const levels = levelsOf(result);

    expect(levels).toEqual([...levels].sort((a, b) => a - b));
    expect(levels).toEqual([0, 1, 1, 1, 2, 2, 2, 3, 3, 3]);
  });

  it("records every new child of a level-L page at level L + 1", async () => {
    const { fetcher } = fakeSite(ring);

    const result = await new BfsCrawler(baseConfig, fetcher).crawl(wiki("N0"), 2);
    const levelOf = new Map(result.pages.map((page) => [page.url, page.level]));

    expect(levelOf.get(wiki("N1"))).toBe(1);
    expect(levelOf.get(wiki("N3"))).toBe(1);
    expect(levelOf.get(wiki("N4"))).toBe(2);
    expect(levelOf.get(wiki("N6"))).toBe(2);
  });

  it("produces the same order with parallel fetches as with sequential ones", async () => {
    const delays = { N0: 5, N1: 30, N2: 1, N3: 15 };
    const sequential = fakeSite(ring, { delays });
    const parallel = fakeSite(ring, { delays });

    const expected = await new BfsCrawler(baseConfig, sequential.fetcher).crawl(wiki("N0"), 3);
    const actual = await new BfsCrawler(
      { ...baseConfig, maxConcurrent: 4 },
      parallel.fetcher,
    ).crawl(wiki("N0"), 3);

    expect(resultLinks(actual)).toEqual(resultLinks(expected));
    expect(levelsOf(actual)).toEqual(levelsOf(expected));
  });

  it("finishes every level-1 fetch before any level-2 fetch starts", async () => {
    const { fetcher, fetched } = fakeSite(ring, { delays: { N1: 20 } });

    await new BfsCrawler({ ...baseConfig, maxConcurrent: 3 }, fetcher).crawl(wiki("N0"), 3);

    expect(fetched.slice(0, 4).sort()).toEqual(["N0", "N1", "N2", "N3"].map(wiki).sort());
    expect(fetched.slice(4).sort()).toEqual(["N4", "N5", "N6"].map(wiki).sort());
  });

  it("honours the configured fan-out cap", async () => {
    const { fetcher } = fakeSite({ Cat: ["A", "B", "C", "D"] });

    const result = await new BfsCrawler({ ...baseConfig, maxLinksPerPage: 2 }, fetcher).crawl(
      wiki("Cat"),
      1,
    );

    expect(resultLinks(result)).toEqual(["Cat", "A", "B"].map(wiki));
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe("BfsCrawler — fetch failures", () => {
  it("warns about a failed page, skips its children and completes", async () => {
    const { fetcher, fetched } = fakeSite(
      { Cat: ["A", "B"], A: ["A1"], B: ["B1", "B2"] },
      { failing: ["A"] },
    );

    const result = await new BfsCrawler(baseConfig, fetcher).crawl(wiki("Cat"), 2);

    expect(resultLinks(result)).toEqual(["Cat", "A", "B", "B1", "B2"].map(wiki));
    expect(fetched).toEqual(["Cat", "A", "B"].map(wiki));
    expect(result.failures).toEqual([
      {
        url: wiki("A"),
        level: 1,
        code: "TIMEOUT",
        reason: `Request to ${wiki("A")} timed out after 10000ms`,
      },
    ]);
    expect(result.summary.pages_failed).toBe(1);
    expect(result.summary.pages_fetched).toBe(2);
    expect(errorSpy).toHaveBeenCalledWith(
      `[bfs-crawler] Could not fetch ${wiki("A")}: [TIMEOUT] Request to ${wiki("A")} timed out after 10000ms`,
    );
  });

  it("keeps the seed first when the seed itself cannot be fetched", async () => {
    const { fetcher } = fakeSite({ Cat: ["A"] }, { failing: ["Cat"] });

    const result = await new BfsCrawler(baseConfig, fetcher).crawl(wiki("Cat"), 3);

    expect(resultLinks(result)).toEqual([wiki("Cat")]);
    expect(result.summary.total_links_found).toBe(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("treats a page without links as a leaf", async () => {
    const { fetcher } = fakeSite({ Cat: ["A"], A: [] });

    const result = await new BfsCrawler(baseConfig, fetcher).crawl(wiki("Cat"), 3);

    expect(resultLinks(result)).toEqual(["Cat", "A"].map(wiki));
  });
});

// ---------------------------------------------------------------------------
// Validation and cancellation
// ---------------------------------------------------------------------------

describe("BfsCrawler — validation", () => {
  it.each([
    ["", 1],
    ["https://example.com/wiki/Cat", 1],
    ["https://en.wikipedia.org/wiki/Special:Random", 1],
    [wiki("Cat"), 0],
    [wiki("Cat"), 4],
    [wiki("Cat"), 1.5],
    [wiki("Cat"), Number.NaN],
  ])("rejects seed %j at depth %s without fetching", async (seed, depth) => {
    const { fetcher, fetched } = fakeSite({});

    await expect(
      new BfsCrawler(baseConfig, fetcher).crawl(seed, depth),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(fetched).toEqual([]);
  });

  it("explains an out-of-range depth", () => {
    const crawler = new BfsCrawler(baseConfig);
    expect(() => crawler.validate(wiki("Cat"), 5)).toThrow(
      "Depth must be an integer between 1 and 3",
    );
  });
});

describe("BfsCrawler — cancellation", () => {
  it("rejects without fetching when the signal has already fired", async () => {
    const { fetcher, fetched } = fakeSite({ Cat: ["A"] });
    const controller = new AbortController();
    controller.abort();

    await expect(
      new BfsCrawler(baseConfig, fetcher).crawl(wiki("Cat"), 2, {
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(CrawlAbortedError);
    expect(fetched).toEqual([]);
  });

  it("stops after the level during which the signal fired", async () => {
    const controller = new AbortController();
    const { fetcher, fetched } = fakeSite(
      { Cat: ["A", "B"], A: ["A1"], B: ["B1"] },
      {
        onFetch: (url) => {
          if (url === wiki("A")) {
            controller.abort();
          }
        },
      },
    );

    await expect(
      new BfsCrawler(baseConfig, fetcher).crawl(wiki("Cat"), 3, {
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(CrawlAbortedError);
    expect(fetched).toEqual([wiki("Cat"), wiki("A")]);
  });

  it("does not start the rest of a level once the signal fires", async () => {
    const controller = new AbortController();
    const { fetcher, fetched } = fakeSite(
      { Cat: ["A", "B", "C", "D"] },
      {
        onFetch: (url) => {
          if (url === wiki("A")) {
            controller.abort();
          }
        },
      },
    );

    await expect(
      new BfsCrawler({ ...baseConfig, maxConcurrent: 1 }, fetcher).crawl(wiki("Cat"), 2, {
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(CrawlAbortedError);
    expect(fetched).toEqual([wiki("Cat"), wiki("A")]);
  });
});
