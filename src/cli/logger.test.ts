import { Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import { createStderrLogger } from "./logger.js";

function collect(): { stream: Writable; text: () => string } {
  let text = "";
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      text += chunk.toString("utf8");
      callback();
    },
  });
  return { stream, text: () => text };
}

describe("createStderrLogger", () => {
  it("should prefix lines with the program name and level", () => {
    const sink = collect();
    const logger = createStderrLogger(sink.stream);
    logger.info("started");
    logger.debug("sort", { entries: 3, threads: false });
    expect(sink.text()).toBe(
      "linefreq: [info] started\nlinefreq: [debug] sort entries=3 threads=false\n",
    );
  });

  it("should quote string values", () => {
    const sink = collect();
    createStderrLogger(sink.stream).info("input", { source: "a b.txt" });
    expect(sink.text()).toBe('linefreq: [info] input source="a b.txt"\n');
  });
});
