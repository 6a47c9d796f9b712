/**
 * Line splitting over a byte stream.
 *
 * Lines end at `\n`; a `\r` right before the `\n` is dropped as well. The
 * last segment is a line even without a terminating `\n`. Bytes are decoded
 * as strict UTF-8, so a malformed or truncated sequence fails the read
 * instead of turning into replacement characters.
 */

import { InputReadError } from "../errors.js";

function stripLineEnding(segment: string): string {
  return segment.endsWith("\r") ? segment.slice(0, -1) : segment;
}

/**
 * Yield the lines of `input` one at a time.
 *
 * String chunks are taken as already decoded. Any failure, whether from
 * the stream itself or from decoding, is rethrown as an InputReadError
 * naming `source`.
 *
 * @example
 * for await (const line of readLines(createReadStream(path), path)) {
 *   // ...
 * }
 */
export async function* readLines(
  input: AsyncIterable<Uint8Array | string>,
  source: string,
): AsyncGenerator<string, void, undefined> {
  const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
  let pending = "";

  try {
    for await (const chunk of input) {
      const text =
        typeof chunk === "string"
          ? chunk
          : decoder.decode(chunk, { stream: true });
      if (!text.includes("\n")) {
        pending += text;
        continue;
      }
      const segments = (pending + text).split("\n");
      pending = segments.pop() ?? "";
      for (const segment of segments) {
        yield stripLineEnding(segment);
      }
    }
    pending += decoder.decode();
  } catch (e) {
    throw new InputReadError(source, e);
  }

  if (pending !== "") {
    yield pending;
  }
}
