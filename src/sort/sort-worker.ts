/**
 * Worker thread that sorts one run of ranked entries.
 *
 * Receives the run through `workerData`, sorts it with the comparator for
 * the requested order, and posts the sorted run back.
 */

import { parentPort, workerData } from "node:worker_threads";
import type { RankedEntry, RankingOrder } from "../types.js";
import { comparatorFor } from "./comparator.js";

export interface SortWorkerInput {
  order: RankingOrder;
  entries: RankedEntry[];
}

export interface SortWorkerSuccess {
  success: true;
  entries: RankedEntry[];
}

export interface SortWorkerError {
  success: false;
  error: string;
}

export type SortWorkerOutput = SortWorkerSuccess | SortWorkerError;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRankedEntry(value: unknown): value is RankedEntry {
  return (
    isRecord(value) &&
    typeof value.line === "string" &&
    typeof value.count === "number"
  );
}

export function isSortWorkerInput(value: unknown): value is SortWorkerInput {
  return (
    isRecord(value) &&
    (value.order === "key" || value.order === "count") &&
    Array.isArray(value.entries) &&
    value.entries.every(isRankedEntry)
  );
}

export function sortRun(input: unknown): SortWorkerOutput {
  if (!isSortWorkerInput(input)) {
    return { success: false, error: "malformed sort request" };
  }
  return {
    success: true,
    entries: input.entries.sort(comparatorFor(input.order)),
  };
}

// Execute when run as worker
if (parentPort) {
  parentPort.postMessage(sortRun(workerData));
}
