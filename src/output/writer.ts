/**
 * Output of ranked entries as `<line>\t<count>` rows.
 */

import type { Writable } from "node:stream";
import { isBrokenPipe, OutputWriteError } from "../errors.js";
import type { BrokenPipeWatcher } from "../signals/broken-pipe.js";
import type { RankedEntry } from "../types.js";

export interface WriteOptions {
  /** Stop after this many rows (default: all entries) */
  top?: number;
}

export interface WriteResult {
  /** Rows handed to the stream before the loop ended */
  rowsWritten: number;
  /** True when the reader closed the pipe and the loop stopped early */
  brokenPipe: boolean;
}

export function formatRow(entry: RankedEntry): string {
  return `${entry.line}\t${entry.count}\n`;
}

/**
 * The failure a finished or destroyed stream stands for, or null while it
 * still takes writes.
 */
function closedFailure(out: Writable): Error | null {
  if (!out.destroyed && !out.writableEnded) {
    return null;
  }
  return (
    out.errored ??
    new Error("output stream closed before all rows were written")
  );
}

/**
 * Resolve once the stream can take more data, or has failed or closed.
 */
function waitForDrain(out: Writable): Promise<void> {
  return new Promise((resolve) => {
    // A stream that is already closed emits nothing more
    if (out.destroyed || out.writableEnded) {
      resolve();
      return;
    }
    const done = () => {
      out.off("drain", done);
      out.off("error", done);
      out.off("close", done);
      resolve();
    };
    out.once("drain", done);
    out.once("error", done);
    out.once("close", done);
  });
}

/**
 * Resolve once everything written so far has been handed off, with the
 * error the stream reported for it, if any.
 */
function flush(out: Writable): Promise<Error | null> {
  return new Promise((resolve) => {
    out.write("", (err) => resolve(err ?? null));
  });
}

/**
 * Write `entries` to `out`, one row per entry, in order.
 *
 * The watcher is checked after every row. The loop yields to the event
 * loop whenever `out` asks for backpressure, which is when a SIGPIPE or a
 * stream error gets the chance to show up. A closed pipe (the watcher
 * tripped, or an EPIPE from the stream) ends the loop without an error;
 * any other stream failure, including a stream destroyed without one,
 * rejects with OutputWriteError.
 */
export async function writeRanked(
  entries: readonly RankedEntry[],
  out: Writable,
  watcher: BrokenPipeWatcher,
  options: WriteOptions = {},
): Promise<WriteResult> {
  const limit = Math.min(options.top ?? entries.length, entries.length);
  let failure: Error | null = null;
  const onError = (err: Error) => {
    failure ??= err;
  };
  out.on("error", onError);

  let rowsWritten = 0;
  try {
    for (let i = 0; i < limit && failure === null; i++) {
      failure = closedFailure(out);
      if (failure !== null) {
        break;
      }
      const flowing = out.write(formatRow(entries[i]));
      rowsWritten++;
      if (!flowing) {
        await waitForDrain(out);
      }
      if (watcher.isTripped()) {
        return { rowsWritten, brokenPipe: true };
      }
    }

    if (failure === null) {
      failure = closedFailure(out) ?? (await flush(out));
    }
  } finally {
    out.off("error", onError);
  }

  if (failure === null) {
    return { rowsWritten, brokenPipe: false };
  }
  if (isBrokenPipe(failure) || watcher.isTripped()) {
    return { rowsWritten, brokenPipe: true };
  }
  throw new OutputWriteError(failure);
}
