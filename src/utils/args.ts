/**
 * Lightweight argument parser for the command line.
 *
 * Handles common patterns:
 * - Boolean flags: -h, --help
 * - Combined short flags: -hV (same as -h -V)
 * - Value options: -s VALUE, -sVALUE, --sortby=VALUE, --sortby VALUE
 * - Positional arguments, and `--` to end option parsing
 * - Unknown option detection
 */

import { ArgumentError } from "../errors.js";

export type ArgType = "boolean" | "string" | "number";

export interface ArgDef {
  /** Short form without dash, e.g., "s" for -s */
  short?: string;
  /** Long form without dashes, e.g., "sortby" for --sortby */
  long?: string;
  /** Type of the argument */
  type: ArgType;
  /** Default value */
  default?: boolean | string | number;
}

export interface ParsedArgs<T extends Record<string, ArgDef>> {
  /** Parsed flag/option values */
  flags: {
    [K in keyof T]: T[K]["type"] extends "boolean"
      ? boolean
      : T[K]["default"] extends number | string
        ? T[K]["type"] extends "number"
          ? number
          : string
        : T[K]["type"] extends "number"
          ? number | undefined
          : string | undefined;
  };
  /** Positional arguments (non-flag arguments) */
  positional: string[];
}

export type ParseResult<T extends Record<string, ArgDef>> =
  | { ok: true; result: ParsedArgs<T> }
  | { ok: false; error: ArgumentError };

type FlagValue = boolean | string | number | undefined;

/**
 * Number options take non-negative decimal integers only; "12abc", "-1"
 * and "1e3" are rejected rather than read as a prefix. Values past
 * Number.MAX_SAFE_INTEGER are clamped to it.
 */
function parseCount(value: string): number | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }
  return Math.min(Number(value), Number.MAX_SAFE_INTEGER);
}

function convertValue(
  type: Exclude<ArgType, "boolean">,
  option: string,
  value: string,
): { ok: true; value: string | number } | { ok: false; error: ArgumentError } {
  if (type === "string") {
    return { ok: true, value };
  }
  const parsed = parseCount(value);
  if (parsed === null) {
    return {
      ok: false,
      error: new ArgumentError(
        `invalid value '${value}' for '${option}': expected a non-negative integer`,
      ),
    };
  }
  return { ok: true, value: parsed };
}

/**
 * Parse command-line arguments according to the provided definitions.
 *
 * @example
 * const defs = {
 *   sortBy: { short: "s", long: "sortby", type: "string" as const, default: "Count" },
 *   top: { long: "top", type: "number" as const },
 * };
 * const parsed = parseArgs(argv, defs);
 * if (!parsed.ok) throw parsed.error;
 * const { flags, positional } = parsed.result;
 */
export function parseArgs<T extends Record<string, ArgDef>>(
  args: string[],
  defs: T,
): ParseResult<T> {
  // Build lookup maps: map short/long options to {name, type}
  const shortToInfo = new Map<string, { name: string; type: ArgType }>();
  const longToInfo = new Map<string, { name: string; type: ArgType }>();

  for (const [name, def] of Object.entries(defs)) {
    const info = { name, type: def.type };
    if (def.short) shortToInfo.set(def.short, info);
    if (def.long) longToInfo.set(def.long, info);
  }

  // Boolean flags default to false, but string/number options without
  // explicit defaults remain undefined (allowing callers to detect if set)
  // Use null-prototype to prevent prototype pollution
  const flags: Record<string, FlagValue> = Object.create(null);
  for (const [name, def] of Object.entries(defs)) {
    if (def.default !== undefined) {
      flags[name] = def.default;
    } else if (def.type === "boolean") {
      flags[name] = false;
    }
  }

  const positional: string[] = [];
  let stopParsing = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (stopParsing || !arg.startsWith("-") || arg === "-") {
      positional.push(arg);
      continue;
    }

    if (arg === "--") {
      stopParsing = true;
      continue;
    }

    if (arg.startsWith("--")) {
      // Long option
      const eqIndex = arg.indexOf("=");
      const optName = eqIndex === -1 ? arg.slice(2) : arg.slice(2, eqIndex);
      let optValue = eqIndex === -1 ? undefined : arg.slice(eqIndex + 1);

      const info = longToInfo.get(optName);
      if (!info) {
        return {
          ok: false,
          error: new ArgumentError(`unrecognized option '${arg}'`),
        };
      }

      const { name, type } = info;
      if (type === "boolean") {
        if (optValue !== undefined) {
          return {
            ok: false,
            error: new ArgumentError(
              `option '--${optName}' doesn't allow an argument`,
            ),
          };
        }
        flags[name] = true;
        continue;
      }

      // Need a value
      if (optValue === undefined) {
        if (i + 1 >= args.length) {
          return {
            ok: false,
            error: new ArgumentError(
              `option '--${optName}' requires an argument`,
            ),
          };
        }
        optValue = args[++i];
      }
      const converted = convertValue(type, `--${optName}`, optValue);
      if (!converted.ok) return converted;
      flags[name] = converted.value;
      continue;
    }

    // Short option(s)
    const chars = arg.slice(1);

    for (let j = 0; j < chars.length; j++) {
      const c = chars[j];
      const info = shortToInfo.get(c);

      if (!info) {
        return {
          ok: false,
          error: new ArgumentError(`invalid option -- '${c}'`),
        };
      }

      const { name, type } = info;
      if (type === "boolean") {
        flags[name] = true;
        continue;
      }

      // Value option - rest of string or next arg
      let optValue: string;
      if (j + 1 < chars.length) {
        // Value is attached: -sKey
        optValue = chars.slice(j + 1);
      } else if (i + 1 < args.length) {
        // Value is next arg: -s Key
        optValue = args[++i];
      } else {
        return {
          ok: false,
          error: new ArgumentError(`option requires an argument -- '${c}'`),
        };
      }
      const converted = convertValue(type, `-${c}`, optValue);
      if (!converted.ok) return converted;
      flags[name] = converted.value;
      break; // Rest of chars consumed as value
    }
  }

  return {
    ok: true,
    result: {
      flags: flags as ParsedArgs<T>["flags"],
      positional,
    },
  };
}
