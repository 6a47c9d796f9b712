/**
 * Error classes for every way a run can fail.
 *
 * All of them are terminal: the CLI reports the message on standard error
 * and exits with `exitCode`. A closed output pipe is not an error and has
 * no class here (see `WriteResult.brokenPipe`).
 */

const ERRNO_MESSAGES: Record<string, string> = {
  ENOENT: "No such file or directory",
  EACCES: "Permission denied",
  EPERM: "Operation not permitted",
  EISDIR: "Is a directory",
  ENOTDIR: "Not a directory",
  EMFILE: "Too many open files",
  EIO: "Input/output error",
  ENOSPC: "No space left on device",
  ERR_ENCODING_INVALID_ENCODED_DATA: "stream did not contain valid UTF-8",
};

/**
 * Extract message from an unknown error value.
 * Handles both Error instances and other thrown values.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Describe an I/O failure the way coreutils do, falling back to the
 * underlying message for codes without a fixed wording.
 */
export function describeIoError(error: unknown): string {
  if (isErrnoException(error) && error.code !== undefined) {
    const known = ERRNO_MESSAGES[error.code];
    if (known !== undefined) {
      return known;
    }
  }
  return getErrorMessage(error);
}

export function isBrokenPipe(error: unknown): boolean {
  return isErrnoException(error) && error.code === "EPIPE";
}

/**
 * Base class for all linefreq failures.
 */
export abstract class LinefreqError extends Error {
  readonly exitCode: number = 1;
}

/**
 * Error thrown for invalid or missing command-line arguments.
 */
export class ArgumentError extends LinefreqError {
  readonly name = "ArgumentError";
}

/**
 * Error thrown when the named input file cannot be opened.
 */
export class InputOpenError extends LinefreqError {
  readonly name = "InputOpenError";

  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`${path}: ${describeIoError(cause)}`, { cause });
  }
}

/**
 * Error thrown when a line cannot be read or decoded mid-stream.
 */
export class InputReadError extends LinefreqError {
  readonly name = "InputReadError";

  constructor(
    readonly source: string,
    cause: unknown,
  ) {
    super(`${source}: ${describeIoError(cause)}`, { cause });
  }
}

/**
 * Error thrown when standard output rejects a write for any reason other
 * than the reader closing the pipe.
 */
export class OutputWriteError extends LinefreqError {
  readonly name = "OutputWriteError";

  constructor(cause: unknown) {
    super(`write error: ${describeIoError(cause)}`, { cause });
  }
}
