/**
 * The linefreq program as a function: arguments and streams in, exit code
 * out. `bin.ts` binds it to the real process; tests drive it with
 * in-memory streams.
 */

import type { Readable, Writable } from "node:stream";
import { countLines, totalCount } from "../count/frequency.js";
import { getErrorMessage, LinefreqError } from "../errors.js";
import { openInput } from "../input/resolver.js";
import { readLines } from "../input/line-reader.js";
import { writeRanked } from "../output/writer.js";
import type { BrokenPipeWatcher } from "../signals/broken-pipe.js";
import type { SortOptions } from "../sort/options.js";
import { sortEntries } from "../sort/sorter.js";
import type { LinefreqLogger } from "../types.js";
import { formatHelp, linefreqHelp, PROGRAM_NAME, VERSION } from "./help.js";
import { createStderrLogger } from "./logger.js";
import { type CliOptions, parseCliOptions } from "./options.js";

export interface CliIO {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
  /** Installed by the caller; consulted by the output loop */
  watcher: BrokenPipeWatcher;
  /** Overrides the `--verbose` logger */
  logger?: LinefreqLogger;
  /** Tuning for the parallel sort */
  sortOptions?: SortOptions;
}

function reportError(stderr: Writable, error: unknown): void {
  stderr.write(`${PROGRAM_NAME}: ${getErrorMessage(error)}\n`);
}

async function countRankWrite(
  options: CliOptions,
  io: CliIO,
  logger: LinefreqLogger | undefined,
): Promise<void> {
  const source = await openInput(options.input, () => io.stdin);
  logger?.info("input", { source: source.label });

  const table = await countLines(readLines(source.stream, source.label));
  logger?.info("counted", { lines: totalCount(table), distinct: table.size });

  const ranked = await sortEntries(table, options.sortBy, {
    ...io.sortOptions,
    logger: logger ?? io.sortOptions?.logger,
  });

  const result = await writeRanked(ranked, io.stdout, io.watcher, {
    top: options.top,
  });
  logger?.info("written", {
    rows: result.rowsWritten,
    brokenPipe: result.brokenPipe,
  });
}

/**
 * Run linefreq with `argv` (arguments only, no program name).
 * Resolves with the exit code; never rejects.
 */
export async function run(argv: string[], io: CliIO): Promise<number> {
  const parsed = parseCliOptions(argv);
  if (!parsed.ok) {
    reportError(io.stderr, parsed.error);
    io.stderr.write(`Try '${PROGRAM_NAME} --help' for more information.\n`);
    return parsed.error.exitCode;
  }

  const { options } = parsed;
  if (options.help) {
    io.stdout.write(formatHelp(linefreqHelp));
    return 0;
  }
  if (options.version) {
    io.stdout.write(`${PROGRAM_NAME} ${VERSION}\n`);
    return 0;
  }

  const logger =
    io.logger ?? (options.verbose ? createStderrLogger(io.stderr) : undefined);

  try {
    await countRankWrite(options, io, logger);
    return 0;
  } catch (e) {
    reportError(io.stderr, e);
    return e instanceof LinefreqError ? e.exitCode : 1;
  }
}
