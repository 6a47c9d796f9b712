// Comparator functions for ranked entries

import type { Comparator, RankedEntry, RankingOrder } from "../types.js";

/**
 * Map a UTF-16 code unit so that comparing mapped units orders strings by
 * code point: surrogates (astral characters) move above U+E000..U+FFFF.
 */
function codePointRank(unit: number): number {
  if (unit >= 0xd800 && unit <= 0xdfff) {
    return unit + 0x2000;
  }
  if (unit >= 0xe000) {
    return unit - 0x800;
  }
  return unit;
}

/**
 * Compare two strings by Unicode code point, with no locale rules.
 * This is the same order as comparing their UTF-8 bytes.
 */
export function compareOrdinal(a: string, b: string): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const unitA = a.charCodeAt(i);
    const unitB = b.charCodeAt(i);
    if (unitA !== unitB) {
      return codePointRank(unitA) - codePointRank(unitB);
    }
  }
  return a.length - b.length;
}

/**
 * Line ascending, then count descending.
 * Lines from one table are unique, so the count step only runs for
 * entries assembled by hand.
 */
export const compareByKey: Comparator<RankedEntry> = (a, b) =>
  compareOrdinal(a.line, b.line) || b.count - a.count;

/** Count descending, then line ascending. */
export const compareByCount: Comparator<RankedEntry> = (a, b) =>
  b.count - a.count || compareOrdinal(a.line, b.line);

/** Comparator for an order that reorders entries. */
export function comparatorFor(order: RankingOrder): Comparator<RankedEntry> {
  switch (order) {
    case "key":
      return compareByKey;
    case "count":
      return compareByCount;
    default: {
      const unreachable: never = order;
      throw new Error(`unknown sorting order: ${String(unreachable)}`);
    }
  }
}
