/**
 * Sort Tuning Configuration
 *
 * Controls when sorting moves off the calling thread and how many worker
 * threads it may use. Every value is optional; undefined values use the
 * defaults.
 */

import { availableParallelism } from "node:os";
import type { LinefreqLogger } from "../types.js";

export interface SortOptions {
  /** Minimum number of entries before sorting in parallel (default: 100000) */
  parallelThreshold?: number;

  /** Maximum number of worker threads (default: available parallelism) */
  maxWorkers?: number;

  /** Optional logger for the chosen strategy */
  logger?: LinefreqLogger;
}

export interface ResolvedSortOptions {
  parallelThreshold: number;
  maxWorkers: number;
  logger?: LinefreqLogger;
}

/**
 * Default tuning. Below the threshold, starting workers and copying the
 * entries to them costs more than the sort itself.
 */
export const DEFAULT_PARALLEL_THRESHOLD = 100_000;

/**
 * Resolve sort options by merging caller-provided values with defaults.
 */
export function resolveSortOptions(
  options: SortOptions = {},
): ResolvedSortOptions {
  return {
    parallelThreshold: Math.max(
      1,
      options.parallelThreshold ?? DEFAULT_PARALLEL_THRESHOLD,
    ),
    maxWorkers: Math.max(
      1,
      Math.floor(options.maxWorkers ?? availableParallelism()),
    ),
    logger: options.logger,
  };
}
