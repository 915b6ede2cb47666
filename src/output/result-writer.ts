/**
 * @module output/result-writer
 * @fileoverview Serialises a crawl result to `results.csv` or `results.json`.
 *
 * File names are fixed; only the directory can change (tests write to a
 * temporary one).
 *
 * CSV layout:
 * ```
 * index,url
 * 1,https://en.wikipedia.org/wiki/Cat
 * 2,https://en.wikipedia.org/wiki/Felidae
 * ```
 */

import fs from "node:fs/promises";
import path from "node:path";
import { resultLinks, type CrawlResult } from "../crawler/bfs-crawler.js";

export type OutputFormat = "csv" | "json";

/** File name written for each format. */
export const OUTPUT_FILES: Readonly<Record<OutputFormat, string>> = {
  csv: "results.csv",
  json: "results.json",
};

/**
 * Shape of `results.json`.
 */
export interface JsonPayload {
  seed: string;
  depth: number;
  total_links_found: number;
  unique_links: number;
  links: string[];
}

function csvEscape(value: string | number): string {
  const s = String(value);
  return /[",\n\r]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

/**
 * Render links as CSV with a 1-based index column.
 */
export function toCsv(links: readonly string[]): string {
  const rows = ["index,url"];
  links.forEach((link, i) => {
    rows.push(`${csvEscape(i + 1)},${csvEscape(link)}`);
  });
  return `${rows.join("\n")}\n`;
}

export function toJsonPayload(result: CrawlResult): JsonPayload {
  return {
    seed: result.seed,
    depth: result.depth,
    total_links_found: result.summary.total_links_found,
    unique_links: result.summary.unique_links,
    links: resultLinks(result),
  };
}

/**
 * Write the result in `format` to its fixed file name inside `dir`.
 *
 * @returns Absolute path of the written file.
 */
export async function writeResults(
  result: CrawlResult,
  format: OutputFormat,
  dir: string = process.cwd(),
): Promise<string> {
  const target = path.resolve(dir, OUTPUT_FILES[format]);
  const body =
    format === "csv"
      ? toCsv(resultLinks(result))
      : `${JSON.stringify(toJsonPayload(result), null, 2)}\n`;

  await fs.writeFile(target, body, "utf-8");
  return target;
}
