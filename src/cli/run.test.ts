import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { Readable, Writable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { BrokenPipeWatcher } from "../signals/broken-pipe.js";
import { VERSION } from "./help.js";
import { run } from "./run.js";

/**
 * Helper to run linefreq in process and capture output
 */
async function runCli(
  args: string[],
  options: { input?: string; watcher?: BrokenPipeWatcher } = {},
): Promise<{ stdout: string; stderr: string; exitCode: number }> {
  let stdout = "";
  let stderr = "";
  const exitCode = await run(args, {
    stdin: Readable.from(options.input === undefined ? [] : [options.input]),
    stdout: new Writable({
      write(chunk: Buffer, _encoding, callback) {
        stdout += chunk.toString("utf8");
        callback();
      },
    }),
    stderr: new Writable({
      write(chunk: Buffer, _encoding, callback) {
        stderr += chunk.toString("utf8");
        callback();
      },
    }),
    watcher: options.watcher ?? {
      install: () => {},
      isTripped: () => false,
    },
  });
  return { stdout, stderr, exitCode };
}

const SAMPLE = "b\na\nb\nc\na\nb\n";

describe("linefreq CLI", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "linefreq-cli-test-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("ranking", () => {
    it("should rank by count by default", async () => {
      const result = await runCli([], { input: SAMPLE });
      expect(result.stdout).toBe("b\t3\na\t2\nc\t1\n");
      expect(result.stderr).toBe("");
      expect(result.exitCode).toBe(0);
    });

    it("should rank by line with --sortby Key", async () => {
      const result = await runCli(["--sortby", "Key"], { input: SAMPLE });
      expect(result.stdout).toBe("a\t2\nb\t3\nc\t1\n");
      expect(result.exitCode).toBe(0);
    });

    it("should accept the sort order in any case", async () => {
      const result = await runCli(["-s", "KEY"], { input: SAMPLE });
      expect(result.stdout).toBe("a\t2\nb\t3\nc\t1\n");
    });

    it("should truncate with --top", async () => {
      const result = await runCli(["--sortby", "Count", "--top", "2"], {
        input: SAMPLE,
      });
      expect(result.stdout).toBe("b\t3\na\t2\n");
      expect(result.exitCode).toBe(0);
    });

    it("should print every row for a --top beyond the safe integer range", async () => {
      const result = await runCli(["--top", "18446744073709551615"], {
        input: SAMPLE,
      });
      expect(result.stdout).toBe("b\t3\na\t2\nc\t1\n");
      expect(result.exitCode).toBe(0);
    });

    it("should print every distinct line with --sortby None", async () => {
      const result = await runCli(["--sortby=none"], { input: SAMPLE });
      expect(result.stdout.split("\n").filter(Boolean).sort()).toEqual([
        "a\t2",
        "b\t3",
        "c\t1",
      ]);
    });

    it("should produce the same output on every run", async () => {
      const first = await runCli(["-s", "count"], { input: SAMPLE });
      const second = await runCli(["-s", "count"], { input: SAMPLE });
      expect(second.stdout).toBe(first.stdout);
    });

    it("should print nothing for empty input", async () => {
      const result = await runCli([], { input: "" });
      expect(result.stdout).toBe("");
      expect(result.stderr).toBe("");
      expect(result.exitCode).toBe(0);
    });

    it("should count CRLF lines like LF lines", async () => {
      const result = await runCli([], { input: "x\r\ny\nx\n" });
      expect(result.stdout).toBe("x\t2\ny\t1\n");
    });
  });

  describe("input file", () => {
    it("should read the named file", async () => {
      const file = path.join(tempDir, "words.txt");
      fs.writeFileSync(file, "pear\napple\npear\n");
      const result = await runCli(["--sortby", "key", file], {
        input: "ignored\n",
      });
      expect(result.stdout).toBe("apple\t1\npear\t2\n");
      expect(result.exitCode).toBe(0);
    });

    it("should fail for a missing file without writing output", async () => {
      const missing = path.join(tempDir, "missing.txt");
      const result = await runCli([missing]);
      expect(result.stdout).toBe("");
      expect(result.stderr).toBe(
        `linefreq: ${missing}: No such file or directory\n`,
      );
      expect(result.exitCode).toBe(1);
    });

    it("should fail on invalid UTF-8 without partial counts", async () => {
      const file = path.join(tempDir, "binary.dat");
      fs.writeFileSync(file, Buffer.from([0x61, 0x0a, 0xfe, 0x0a]));
      const result = await runCli([file]);
      expect(result.stdout).toBe("");
      expect(result.stderr).toBe(
        `linefreq: ${file}: stream did not contain valid UTF-8\n`,
      );
      expect(result.exitCode).toBe(1);
    });
  });

  describe("arguments", () => {
    it("should reject an unknown sort order before reading input", async () => {
      const result = await runCli(["--sortby", "size"], { input: SAMPLE });
      expect(result.stdout).toBe("");
      expect(result.stderr).toBe(
        "linefreq: invalid value 'size' for '--sortby': possible values are Key, Count, None\n" +
          "Try 'linefreq --help' for more information.\n",
      );
      expect(result.exitCode).toBe(1);
    });

    it("should reject a malformed --top", async () => {
      const result = await runCli(["--top", "-3"], { input: SAMPLE });
      expect(result.stdout).toBe("");
      expect(result.exitCode).toBe(1);
    });

    it("should reject unknown options", async () => {
      const result = await runCli(["--count"]);
      expect(result.stderr).toContain("unrecognized option '--count'");
      expect(result.exitCode).toBe(1);
    });

    it("should show help with --help", async () => {
      const result = await runCli(["--help"]);
      expect(result.stdout).toContain(
        "Usage: linefreq [OPTION]... [INPUT]\n",
      );
      expect(result.exitCode).toBe(0);
    });

    it("should show the version with -V", async () => {
      const result = await runCli(["-V"]);
      expect(result.stdout).toBe(`linefreq ${VERSION}\n`);
      expect(result.exitCode).toBe(0);
    });
  });

  describe("broken pipe", () => {
    it("should stop writing and exit 0 when the watcher trips", async () => {
      let rows = 0;
      const watcher: BrokenPipeWatcher = {
        install: () => {},
        isTripped: () => ++rows >= 1,
      };
      const result = await runCli([], { input: SAMPLE, watcher });
      expect(result.stdout).toBe("b\t3\n");
      expect(result.stderr).toBe("");
      expect(result.exitCode).toBe(0);
    });
  });

  describe("logging", () => {
    it("should log progress to stderr with --verbose", async () => {
      const result = await runCli(["--verbose", "--top", "1"], {
        input: SAMPLE,
      });
      expect(result.stdout).toBe("b\t3\n");
      expect(result.stderr.split("\n")).toEqual([
        'linefreq: [info] input source="standard input"',
        "linefreq: [info] counted lines=6 distinct=3",
        'linefreq: [debug] sort order="count" entries=3 workers=1',
        "linefreq: [info] written rows=1 brokenPipe=false",
        "",
      ]);
    });

    it("should send logs to an injected logger", async () => {
      const logger = { info: vi.fn(), debug: vi.fn() };
      let stdout = "";
      const exitCode = await run([], {
        stdin: Readable.from([SAMPLE]),
        stdout: new Writable({
          write(chunk: Buffer, _encoding, callback) {
            stdout += chunk.toString("utf8");
            callback();
          },
        }),
        stderr: new Writable({
          write(_chunk, _encoding, callback) {
            callback();
          },
        }),
        watcher: { install: () => {}, isTripped: () => false },
        logger,
      });
      expect(exitCode).toBe(0);
      expect(stdout).toBe("b\t3\na\t2\nc\t1\n");
      expect(logger.info).toHaveBeenCalledWith("counted", {
        lines: 6,
        distinct: 3,
      });
    });
  });
});
