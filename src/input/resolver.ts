/**
 * Input selection: a named file, or standard input when no path is given.
 */

import { open } from "node:fs/promises";
import type { Readable } from "node:stream";
import { InputOpenError } from "../errors.js";

export const STDIN_LABEL = "standard input";

export interface InputSource {
  /** Name used in diagnostics: the path, or "standard input" */
  label: string;
  stream: Readable;
}

/**
 * Open the input for a run.
 *
 * `stdin` is only called when no path is given. The file is opened before
 * this resolves, so a missing or unreadable path fails here with an
 * InputOpenError and counting never starts.
 */
export async function openInput(
  path: string | undefined,
  stdin: () => Readable,
): Promise<InputSource> {
  if (path === undefined) {
    return { label: STDIN_LABEL, stream: stdin() };
  }

  try {
    const handle = await open(path, "r");
    return { label: path, stream: handle.createReadStream() };
  } catch (e) {
    throw new InputOpenError(path, e);
  }
}
