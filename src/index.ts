#!/usr/bin/env node
/**
 * @module index
 * @fileoverview wiki-crawler command line entry point.
 *
 * ## Architecture
 * ```
 * index.ts (this file)
 *   |
 *   +-- cli/run.ts --> cli/args.ts            (argument validation)
 *                  --> crawler/bfs-crawler.ts (BFS engine)
 *                  --> output/result-writer.ts (results.csv / results.json)
 * ```
 *
 * ## Environment Variables
 * See {@link loadConfig} in `config.ts`: `SITE_DOMAIN`, `SITE_BASE_URL`,
 * `ARTICLE_PATH_PREFIX`, `MAX_LINKS_PER_PAGE`, `FETCH_TIMEOUT`,
 * `MAX_CONCURRENT`, `MAX_RESPONSE_SIZE`, `USER_AGENT`.
 */

import { runCli } from "./cli/run.js";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
