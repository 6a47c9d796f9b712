/**
 * Ranking of a frequency table.
 */

import type {
  FrequencyTable,
  RankedEntry,
  RankingOrder,
  SortingOrder,
} from "../types.js";
import { comparatorFor } from "./comparator.js";
import {
  type ResolvedSortOptions,
  resolveSortOptions,
  type SortOptions,
} from "./options.js";
import { findWorkerPath, parallelSort } from "./parallel.js";

/** Project a table onto (line, count) pairs in iteration order. */
export function toEntries(table: FrequencyTable): RankedEntry[] {
  const entries: RankedEntry[] = [];
  for (const [line, count] of table) {
    entries.push({ line, count });
  }
  return entries;
}

async function rank(
  entries: RankedEntry[],
  order: RankingOrder,
  { parallelThreshold, maxWorkers, logger }: ResolvedSortOptions,
): Promise<RankedEntry[]> {
  const compare = comparatorFor(order);

  if (entries.length < parallelThreshold || maxWorkers < 2) {
    logger?.debug("sort", { order, entries: entries.length, workers: 1 });
    return entries.sort(compare);
  }

  const workerPath = findWorkerPath();
  logger?.debug("sort", {
    order,
    entries: entries.length,
    workers: maxWorkers,
    threads: workerPath !== null,
  });
  return parallelSort(entries, order, compare, maxWorkers, workerPath);
}

/**
 * Produce the ranked entries of `table` in `order`.
 *
 * Large tables are sorted across worker threads (see SortOptions); the
 * order of the result does not depend on whether that happened.
 *
 * @example
 * const ranked = await sortEntries(table, "count");
 */
export async function sortEntries(
  table: FrequencyTable,
  order: SortingOrder,
  options: SortOptions = {},
): Promise<RankedEntry[]> {
  const resolved = resolveSortOptions(options);
  const entries = toEntries(table);

  switch (order) {
    case "none":
      resolved.logger?.debug("sort skipped", {
        order,
        entries: entries.length,
      });
      return entries;
    case "key":
    case "count":
      return rank(entries, order, resolved);
    default: {
      const unreachable: never = order;
      throw new Error(`unknown sorting order: ${String(unreachable)}`);
    }
  }
}
