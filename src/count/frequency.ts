/**
 * Line frequency counting.
 */

import type { FrequencyTable } from "../types.js";

/**
 * Count occurrences of each distinct line.
 *
 * Consumes `lines` to completion before resolving; if the source fails
 * part way, the error propagates and the partial table is dropped.
 *
 * @example
 * ```typescript
 * const table = await countLines(["b", "a", "b"]);
 * // Map { 'b' => 2, 'a' => 1 }
 * ```
 */
export async function countLines(
  lines: AsyncIterable<string> | Iterable<string>,
): Promise<FrequencyTable> {
  const table: FrequencyTable = new Map();
  for await (const line of lines) {
    table.set(line, (table.get(line) ?? 0) + 1);
  }
  return table;
}

/** Sum of all counts, equal to the number of lines counted. */
export function totalCount(table: FrequencyTable): number {
  let total = 0;
  for (const count of table.values()) {
    total += count;
  }
  return total;
}
