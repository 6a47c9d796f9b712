/**
 * Broken-pipe detection.
 *
 * When the process reading our output exits (`linefreq big.log | head`),
 * POSIX systems deliver SIGPIPE on the next write. The watcher turns that
 * signal into a flag the output loop polls between lines. Platforms
 * without SIGPIPE get a watcher that never installs anything; there the
 * writer only learns about the closed pipe from the EPIPE write error.
 */

/**
 * A boolean shared between the signal listener and the output loop.
 * It goes from false to true at most once and is never reset.
 */
export class SharedFlag {
  private readonly cell = new Int32Array(new SharedArrayBuffer(4));

  set(): void {
    Atomics.store(this.cell, 0, 1);
  }

  isSet(): boolean {
    return Atomics.load(this.cell, 0) === 1;
  }
}

export interface BrokenPipeWatcher {
  /** Start listening. Calling it again has no further effect. */
  install(): void;
  /** Whether the reader has closed the output pipe. */
  isTripped(): boolean;
}

/** The part of `process` a watcher needs to listen for signals. */
export interface SignalSource {
  on(event: "SIGPIPE", listener: () => void): unknown;
}

/**
 * Watcher backed by a real SIGPIPE listener.
 * The listener only sets the flag.
 */
export class PosixBrokenPipeWatcher implements BrokenPipeWatcher {
  private installed = false;

  constructor(
    private readonly flag: SharedFlag,
    private readonly signals: SignalSource = process,
  ) {}

  install(): void {
    if (this.installed) {
      return;
    }
    this.installed = true;
    this.signals.on("SIGPIPE", () => this.flag.set());
  }

  isTripped(): boolean {
    return this.flag.isSet();
  }
}

/**
 * Watcher for platforms without SIGPIPE.
 */
export class NoopBrokenPipeWatcher implements BrokenPipeWatcher {
  constructor(private readonly flag: SharedFlag) {}

  install(): void {}

  isTripped(): boolean {
    return this.flag.isSet();
  }
}

/**
 * Pick the watcher for `platform`.
 */
export function createBrokenPipeWatcher(
  flag: SharedFlag,
  platform: NodeJS.Platform = process.platform,
): BrokenPipeWatcher {
  return platform === "win32"
    ? new NoopBrokenPipeWatcher(flag)
    : new PosixBrokenPipeWatcher(flag);
}
