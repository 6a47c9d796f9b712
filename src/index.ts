export { run } from "./cli/run.js";
export type { CliIO } from "./cli/run.js";
export { createStderrLogger } from "./cli/logger.js";
export { countLines, totalCount } from "./count/frequency.js";
export {
  ArgumentError,
  describeIoError,
  getErrorMessage,
  InputOpenError,
  InputReadError,
  LinefreqError,
  OutputWriteError,
} from "./errors.js";
export { readLines } from "./input/line-reader.js";
export { openInput, STDIN_LABEL } from "./input/resolver.js";
export type { InputSource } from "./input/resolver.js";
export { formatRow, writeRanked } from "./output/writer.js";
export type { WriteOptions, WriteResult } from "./output/writer.js";
export {
  createBrokenPipeWatcher,
  NoopBrokenPipeWatcher,
  PosixBrokenPipeWatcher,
  SharedFlag,
} from "./signals/broken-pipe.js";
export type { BrokenPipeWatcher, SignalSource } from "./signals/broken-pipe.js";
export {
  comparatorFor,
  compareByCount,
  compareByKey,
  compareOrdinal,
} from "./sort/comparator.js";
export { DEFAULT_PARALLEL_THRESHOLD, resolveSortOptions } from "./sort/options.js";
export type { ResolvedSortOptions, SortOptions } from "./sort/options.js";
export { mergeSortedRuns, partition } from "./sort/parallel.js";
export { sortEntries, toEntries } from "./sort/sorter.js";
export type {
  Comparator,
  FrequencyTable,
  LinefreqLogger,
  RankedEntry,
  RankingOrder,
  SortingOrder,
} from "./types.js";
