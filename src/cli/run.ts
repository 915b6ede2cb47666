/**
 * @module cli/run
 * @fileoverview The `wiki-crawler` command: parse, crawl, report, write.
 *
 * ## Exit Codes
 * | Code | Meaning                                                  |
 * |------|----------------------------------------------------------|
 * | 0    | Crawl completed (page failures are only warnings)        |
 * | 1    | Unexpected failure, e.g. the output file is not writable |
 * | 2    | Invalid arguments; nothing was fetched                   |
 * | 130  | Interrupted by SIGINT                                    |
 */

import { config as defaultConfig, type CrawlerConfig } from "../config.js";
import { BfsCrawler, type CrawlResult } from "../crawler/bfs-crawler.js";
import type { PageFetcher } from "../services/fetch.js";
import { OUTPUT_FILES, writeResults } from "../output/result-writer.js";
import {
  CrawlAbortedError,
  ValidationError,
  formatError,
} from "../utils/errors.js";
import { canonicalizeSeed } from "../utils/url.js";
import { USAGE, parseCliArgs, type ParsedCommand } from "./args.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_INTERRUPTED = 130;

/**
 * Collaborators of {@link runCli}, replaceable in tests.
 */
export interface CliDependencies {
  config?: CrawlerConfig;
  fetcher?: PageFetcher;

  /** Directory result files are written to. Defaults to `process.cwd()`. */
  cwd?: string;

  /** Aborts the crawl. When omitted, SIGINT does. */
  signal?: AbortSignal;
}

/**
 * Completion summary printed to stdout.
 *
 * @example
 * ```ts
 * formatSummary(result);
 * // => "\nCrawl complete (depth 1)\nTotal links found :    4\nUnique links      :    4"
 * ```
 */
export function formatSummary(result: CrawlResult): string {
  const total = String(result.summary.total_links_found).padStart(4);
  const unique = String(result.summary.unique_links).padStart(4);
  return [
    "",
    `Crawl complete (depth ${result.depth})`,
    `Total links found : ${total}`,
    `Unique links      : ${unique}`,
  ].join("\n");
}

/**
 * Run the command and resolve with its exit code. Never rejects.
 *
 * @param argv - `process.argv.slice(2)`.
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDependencies = {},
): Promise<number> {
  const cfg = deps.config ?? defaultConfig;

  let command: ParsedCommand;
  try {
    command = parseCliArgs(argv, cfg);
  } catch (error: unknown) {
    if (error instanceof ValidationError) {
      console.error(USAGE);
      console.error(`error: ${error.message}`);
      return EXIT_USAGE;
    }
    console.error(`[wiki-crawler] ${formatError(error)}`);
    return EXIT_FAILURE;
  }

  if (command.command === "help") {
    console.log(USAGE);
    return EXIT_OK;
  }

  const { url, depth, out } = command.request;

  let signal = deps.signal;
  let detachSigint = (): void => {};
  if (!signal) {
    const controller = new AbortController();
    const onSigint = (): void => controller.abort();
    process.once("SIGINT", onSigint);
    detachSigint = () => {
      process.removeListener("SIGINT", onSigint);
    };
    signal = controller.signal;
  }

  // Same canonical form the crawl records as its first entry.
  console.log(`Starting crawl from: ${canonicalizeSeed(url)}`);

  try {
    const crawler = new BfsCrawler(cfg, deps.fetcher);
    const result = await crawler.crawl(url, depth, { signal });

    console.log(formatSummary(result));

    if (out) {
      await writeResults(result, out, deps.cwd);
      console.log(`→ ${OUTPUT_FILES[out]} written`);
    }

    return EXIT_OK;
  } catch (error: unknown) {
    if (error instanceof CrawlAbortedError) {
      console.error("Crawl interrupted");
      return EXIT_INTERRUPTED;
    }
    if (error instanceof ValidationError) {
      console.error(USAGE);
      console.error(`error: ${error.message}`);
      return EXIT_USAGE;
    }
    console.error(`[wiki-crawler] ${formatError(error)}`);
    return EXIT_FAILURE;
  } finally {
    detachSigint();
  }
}
