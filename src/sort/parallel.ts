/**
 * Parallel sorting over worker threads.
 *
 * The entries are cut into contiguous runs, each run is sorted in its own
 * worker with the order's comparator, and the sorted runs are merged here.
 * Merging with the same comparator makes the result identical to sorting
 * the whole array on one thread, however the runs were cut.
 */

import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Worker } from "node:worker_threads";
import type { Comparator, RankedEntry, RankingOrder } from "../types.js";
import type { SortWorkerInput, SortWorkerOutput } from "./sort-worker.js";

/**
 * Split `items` into at most `parts` contiguous runs of near-equal length.
 * Never returns empty runs.
 */
export function partition<T>(items: readonly T[], parts: number): T[][] {
  const count = Math.max(1, Math.min(Math.floor(parts), items.length));
  const runs: T[][] = [];
  const base = Math.floor(items.length / count);
  const extra = items.length % count;
  let start = 0;
  for (let i = 0; i < count && start < items.length; i++) {
    const end = start + base + (i < extra ? 1 : 0);
    runs.push(items.slice(start, end));
    start = end;
  }
  return runs;
}

function mergeTwo<T>(left: T[], right: T[], compare: Comparator<T>): T[] {
  const merged: T[] = new Array(left.length + right.length);
  let i = 0;
  let j = 0;
  let k = 0;
  while (i < left.length && j < right.length) {
    // Take from the left run on ties to keep run order stable
    if (compare(right[j], left[i]) < 0) {
      merged[k++] = right[j++];
    } else {
      merged[k++] = left[i++];
    }
  }
  while (i < left.length) merged[k++] = left[i++];
  while (j < right.length) merged[k++] = right[j++];
  return merged;
}

/**
 * Merge runs that are each sorted by `compare` into one sorted array,
 * pairing runs up level by level.
 */
export function mergeSortedRuns<T>(runs: T[][], compare: Comparator<T>): T[] {
  if (runs.length === 0) {
    return [];
  }
  let level = runs;
  while (level.length > 1) {
    const next: T[][] = [];
    for (let i = 0; i < level.length; i += 2) {
      next.push(
        i + 1 < level.length
          ? mergeTwo(level[i], level[i + 1], compare)
          : level[i],
      );
    }
    level = next;
  }
  return level[0];
}

/**
 * Find the compiled sort worker next to this module.
 * Returns null when running from TypeScript sources, where there is no
 * JavaScript worker to start.
 */
export function findWorkerPath(): string | null {
  const currentDir = dirname(fileURLToPath(import.meta.url));
  const workerPath = join(currentDir, "sort-worker.js");
  return existsSync(workerPath) ? workerPath : null;
}

/**
 * Sort one run in a fresh worker thread.
 */
export function sortRunInWorker(
  workerPath: string,
  input: SortWorkerInput,
): Promise<RankedEntry[]> {
  return new Promise((resolve, reject) => {
    const worker = new Worker(workerPath, { workerData: input });
    let settled = false;

    worker.on("message", (result: SortWorkerOutput) => {
      settled = true;
      if (result.success) {
        resolve(result.entries);
      } else {
        reject(new Error(`sort worker failed: ${result.error}`));
      }
    });

    worker.on("error", (err) => {
      settled = true;
      reject(err);
    });

    worker.on("exit", (code) => {
      if (!settled) {
        reject(new Error(`sort worker exited with code ${code}`));
      }
    });
  });
}

/**
 * Sort `entries` by `order` using up to `workers` runs.
 * `compare` must be the comparator for `order`; it sorts the runs in
 * process when `workerPath` is null, and merges the runs either way.
 */
export async function parallelSort(
  entries: readonly RankedEntry[],
  order: RankingOrder,
  compare: Comparator<RankedEntry>,
  workers: number,
  workerPath: string | null,
): Promise<RankedEntry[]> {
  const runs = partition(entries, workers);
  const sortedRuns =
    workerPath === null
      ? runs.map((run) => run.sort(compare))
      : await Promise.all(
          runs.map((run) => sortRunInWorker(workerPath, { order, entries: run })),
        );
  return mergeSortedRuns(sortedRuns, compare);
}
