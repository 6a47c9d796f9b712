/**
 * Core types shared by the counting, sorting and output stages.
 */

/**
 * Mapping from distinct line content to its number of occurrences.
 * Iteration order is insertion order, which callers must not rely on.
 */
export type FrequencyTable = Map<string, number>;

/** One (line, count) pair taken from a FrequencyTable. */
export interface RankedEntry {
  line: string;
  count: number;
}

/**
 * Ordering applied to ranked entries.
 *
 * - `key`: line ascending, ties broken by count descending
 * - `count`: count descending, ties broken by line ascending
 * - `none`: table iteration order
 */
export type SortingOrder = "key" | "count" | "none";

/** Orders that actually reorder entries. */
export type RankingOrder = Exclude<SortingOrder, "none">;

export type Comparator<T> = (a: T, b: T) => number;

/**
 * Logger interface for execution tracing.
 * Implement this interface to receive progress logs.
 */
export interface LinefreqLogger {
  /** Log informational messages (input source, totals, write outcome) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (sort strategy) */
  debug(message: string, data?: Record<string, unknown>): void;
}
