#!/usr/bin/env node
/**
 * linefreq CLI - count distinct lines and print them ranked
 *
 * Usage:
 *   linefreq [OPTION]... [INPUT]
 *
 * Examples:
 *   linefreq access.log
 *   cut -d' ' -f1 access.log | linefreq --top 10
 *   linefreq --sortby key words.txt | head
 */

import { isBrokenPipe } from "../errors.js";
import {
  createBrokenPipeWatcher,
  SharedFlag,
} from "../signals/broken-pipe.js";
import { run } from "./run.js";

async function main(): Promise<void> {
  const brokenPipe = new SharedFlag();
  const watcher = createBrokenPipeWatcher(brokenPipe);
  watcher.install();

  // Rows still queued when the output loop stops early fail with EPIPE
  // after run() has returned.
  process.stdout.on("error", (err: NodeJS.ErrnoException) => {
    if (!isBrokenPipe(err)) {
      process.exitCode = 1;
    }
  });

  const exitCode = await run(process.argv.slice(2), {
    get stdin() {
      return process.stdin;
    },
    stdout: process.stdout,
    stderr: process.stderr,
    watcher,
  });
  if (exitCode !== 0) {
    process.exitCode = exitCode;
  }
}

main().catch((e) => {
  console.error("Fatal error:", e);
  process.exit(1);
});
