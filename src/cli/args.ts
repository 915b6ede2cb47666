/**
 * @module cli/args
 * @fileoverview Command line parsing and validation.
 *
 * ```
 * wiki-crawler <seed-url> <depth> [--out csv|json]
 * ```
 *
 * Raw argv is split into positionals and `--key value` / `--key=value`
 * options, then checked against a zod schema built for the configured site.
 * Every rejection surfaces as a {@link ValidationError}, before any network
 * activity.
 */

import { z } from "zod";
import type { CrawlerConfig } from "../config.js";
import { ValidationError } from "../utils/errors.js";
import { isValidArticleUrl } from "../utils/url.js";

export const USAGE = "usage: wiki-crawler <seed-url> <depth> [--out {csv,json}]";

/** Options that take a value. */
const VALUE_OPTIONS: ReadonlySet<string> = new Set(["out"]);

type RawArgs = {
  positionals: string[];
  options: Record<string, string>;
  help: boolean;
};

/**
 * Build the seed request schema for a configuration.
 *
 * Depth arrives as a string and is coerced; fractional, non-numeric or
 * out-of-range values all fail with the same message.
 */
export function createSeedRequestSchema(cfg: CrawlerConfig) {
  const depthMessage = `Depth must be an integer between ${cfg.minDepth} and ${cfg.maxDepth}`;

  return z.object({
    url: z
      .string()
      .refine((value) => isValidArticleUrl(value, cfg.site), {
        message: `URL must be a valid ${cfg.site.domain}/${cfg.site.articlePrefix}/... link`,
      }),
    depth: z.coerce
      .number({ invalid_type_error: depthMessage })
      .int(depthMessage)
      .min(cfg.minDepth, depthMessage)
      .max(cfg.maxDepth, depthMessage),
    out: z
      .enum(["csv", "json"], {
        errorMap: () => ({ message: "--out must be one of: csv, json" }),
      })
      .optional(),
  });
}

export type SeedRequest = z.infer<ReturnType<typeof createSeedRequestSchema>>;

export type ParsedCommand =
  | { command: "help" }
  | { command: "crawl"; request: SeedRequest };

function splitArgs(argv: readonly string[]): RawArgs {
  const positionals: string[] = [];
  const options: Record<string, string> = {};
  let help = false;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === undefined) {
      continue;
    }

    if (arg === "--help" || arg === "-h") {
      help = true;
      continue;
    }

    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const [key = "", inlineValue] = arg.slice(2).split("=", 2);
    if (!VALUE_OPTIONS.has(key)) {
      throw new ValidationError(`Unknown option: --${key}`);
    }

    if (inlineValue !== undefined) {
      options[key] = inlineValue;
      continue;
    }

    const next = argv[index + 1];
    if (next === undefined || next.startsWith("--")) {
      throw new ValidationError(`Option --${key} expects a value`);
    }
    options[key] = next;
    index += 1;
  }

  return { positionals, options, help };
}

/**
 * Parse and validate command line arguments.
 *
 * @param argv - Arguments after the executable and script, i.e.
 *   `process.argv.slice(2)`.
 * @throws {ValidationError} On unknown options, a wrong number of
 *   positionals, an invalid URL or an out-of-range depth.
 *
 * @example
 * ```ts
 * parseCliArgs(["https://en.wikipedia.org/wiki/Cat", "2", "--out", "csv"], config);
 * // => { command: "crawl",
 * //      request: { url: "https://en.wikipedia.org/wiki/Cat", depth: 2, out: "csv" } }
 * ```
 */
export function parseCliArgs(
  argv: readonly string[],
  cfg: CrawlerConfig,
): ParsedCommand {
  const raw = splitArgs(argv);
  if (raw.help) {
    return { command: "help" };
  }

  if (raw.positionals.length !== 2) {
    throw new ValidationError(
      `Expected 2 arguments (<seed-url> <depth>), received ${raw.positionals.length}`,
    );
  }

  const [url, depth] = raw.positionals;
  const parsed = createSeedRequestSchema(cfg).safeParse({
    url,
    depth,
    out: raw.options.out,
  });

  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ValidationError(first ? first.message : "Invalid arguments");
  }

  return { command: "crawl", request: parsed.data };
}
