/**
 * @fileoverview Bounded worker pool for fetching one BFS level at a time.
 *
 * The crawl engine hands the pool every frontier entry of the current level
 * and waits for all of them to settle before it merges discoveries and
 * moves on. The pool only bounds how many requests are in flight; ordering
 * and deduplication stay with the engine.
 *
 * ```
 *   level N frontier  [a, b, c, d, e]
 *          |
 *          v
 *   [ FetchPool ]   <-- at most `concurrency` tasks running
 *          |
 *          v
 *   results in input order  [ra, rb, rc, rd, re]
 * ```
 *
 * @module services/queue
 */

import PQueue from "p-queue";
import { CrawlAbortedError } from "../utils/errors.js";

// ---------------------------------------------------------------------------
// FetchPool Class
// ---------------------------------------------------------------------------

/**
 * Runs batches of async tasks with a concurrency cap.
 *
 * ## Usage
 *
 * ```typescript
 * const pool = new FetchPool(4);
 * const pages = await pool.runAll(urls, (url) => fetchPage(url, options));
 * ```
 *
 * With a concurrency of 1 the tasks run strictly one after another, in
 * input order.
 */
export class FetchPool {
  /**
   * The underlying p-queue instance.
   */
  private queue: PQueue;

  /**
   * @param concurrency - Maximum number of tasks in flight. Values below 1
   *   are raised to 1.
   */
  constructor(concurrency: number) {
    this.queue = new PQueue({
      concurrency: Math.max(1, Math.floor(concurrency)),
    });
  }

  /**
   * Run `task` for every item and resolve with the results in item order,
   * regardless of completion order.
   *
   * Rejects with the first task rejection. Tasks should report their
   * own failures as values (see `fetchPage`).
   *
   * Once `signal` fires, no further task is started and the batch rejects
   * with {@link CrawlAbortedError} without waiting for tasks already in
   * flight. Entries dropped by {@link FetchPool.clear} never settle, so
   * callers that clear the pool must pass the signal that triggered it.
   */
  async runAll<T, R>(
    items: readonly T[],
    task: (item: T, index: number) => Promise<R>,
    signal?: AbortSignal,
  ): Promise<R[]> {
    const settled = Promise.all(
      items.map((item, index) =>
        this.queue.add(
          () => {
            if (signal?.aborted) {
              return Promise.reject(new CrawlAbortedError());
            }
            return task(item, index);
          },
          { throwOnTimeout: true },
        ),
      ),
    );

    if (!signal) {
      return settled;
    }

    let onAbort = (): void => {};
    const aborted = new Promise<never>((_resolve, reject) => {
      onAbort = () => reject(new CrawlAbortedError());
    });
    signal.addEventListener("abort", onAbort, { once: true });
    if (signal.aborted) {
      onAbort();
    }

    try {
      return await Promise.race([settled, aborted]);
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }

  /**
   * Drop every task that has not started yet. Running tasks are left alone.
   */
  clear(): void {
    this.queue.clear();
  }

  /**
   * Number of tasks waiting for a free slot.
   */
  get pending(): number {
    return this.queue.size;
  }

  /**
   * Maximum number of tasks in flight.
   */
  get concurrency(): number {
    return this.queue.concurrency;
  }
}
