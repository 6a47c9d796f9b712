/**
 * Command-line option parsing and validation.
 *
 * Everything the user typed is checked here, before any input is opened:
 * an unknown sort order or a malformed `--top` fails the run up front.
 */

import { ArgumentError } from "../errors.js";
import type { SortingOrder } from "../types.js";
import { parseArgs } from "../utils/args.js";

export interface CliOptions {
  sortBy: SortingOrder;
  top?: number;
  input?: string;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

export type CliParseResult =
  | { ok: true; options: CliOptions }
  | { ok: false; error: ArgumentError };

const argDefs = {
  sortBy: {
    short: "s",
    long: "sortby",
    type: "string" as const,
    default: "Count",
  },
  top: { long: "top", type: "number" as const },
  verbose: { long: "verbose", type: "boolean" as const },
  help: { short: "h", long: "help", type: "boolean" as const },
  version: { short: "V", long: "version", type: "boolean" as const },
};

const SORTING_ORDERS: Record<string, SortingOrder> = {
  key: "key",
  count: "count",
  none: "none",
};

/**
 * Parse a sorting order name, ignoring case ("Key", "COUNT", "none").
 */
export function parseSortingOrder(raw: string): SortingOrder | null {
  return Object.hasOwn(SORTING_ORDERS, raw.toLowerCase())
    ? SORTING_ORDERS[raw.toLowerCase()]
    : null;
}

export function parseCliOptions(argv: string[]): CliParseResult {
  const parsed = parseArgs(argv, argDefs);
  if (!parsed.ok) return parsed;

  const { flags, positional } = parsed.result;

  const sortBy = parseSortingOrder(flags.sortBy);
  if (sortBy === null) {
    return {
      ok: false,
      error: new ArgumentError(
        `invalid value '${flags.sortBy}' for '--sortby': possible values are Key, Count, None`,
      ),
    };
  }

  if (positional.length > 1) {
    return {
      ok: false,
      error: new ArgumentError(`unexpected argument '${positional[1]}'`),
    };
  }

  return {
    ok: true,
    options: {
      sortBy,
      top: flags.top,
      input: positional[0],
      verbose: flags.verbose,
      help: flags.help,
      version: flags.version,
    },
  };
}
