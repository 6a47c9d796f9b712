import type { Writable } from "node:stream";
import type { LinefreqLogger } from "../types.js";
import { PROGRAM_NAME } from "./help.js";

function formatData(data?: Record<string, unknown>): string {
  if (!data) return "";
  return Object.entries(data)
    .map(
      ([key, value]) =>
        ` ${key}=${typeof value === "string" ? JSON.stringify(value) : String(value)}`,
    )
    .join("");
}

/**
 * Logger that writes `linefreq: [level] message key=value` lines to
 * `stream`, for `--verbose`.
 */
export function createStderrLogger(stream: Writable): LinefreqLogger {
  const log = (level: string, message: string, data?: Record<string, unknown>) => {
    stream.write(`${PROGRAM_NAME}: [${level}] ${message}${formatData(data)}\n`);
  };
  return {
    info: (message, data) => log("info", message, data),
    debug: (message, data) => log("debug", message, data),
  };
}
