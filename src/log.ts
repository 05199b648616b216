// Operation log: one JSON line per CLI command

import { appendFile, mkdir } from "fs/promises";
import { join, resolve } from "path";
import type { ProgressCallback } from "./types";

export const LOG_FILE_NAME = "medal-draft-log.jsonl";

export type LogEntry = {
  timestamp: string;
  operation: string;
  durationMs: number;
  /** Progress messages starting with "Warning:" */
  warnings: string[];
  details?: Record<string, unknown>;
};

export async function appendLog(entry: LogEntry, dir: string): Promise<void> {
  const resolvedDir = resolve(dir);
  await mkdir(resolvedDir, { recursive: true });
  const line = JSON.stringify(entry);
  await appendFile(join(resolvedDir, LOG_FILE_NAME), `${line}\n`, "utf-8");
}

export interface Operation {
  /** Forwards to the reporter and keeps the warnings for the log line */
  onProgress: ProgressCallback;
  finish(details?: Record<string, unknown>): Promise<LogEntry>;
  readonly logFile: string;
}

/**
 * Start timing a command. `finish` appends its log line, including every
 * warning reported along the way.
 */
export function startOperation(
  operation: string,
  dir: string,
  report?: ProgressCallback,
  now: () => number = Date.now,
): Operation {
  const startedAt = now();
  const warnings: string[] = [];

  return {
    logFile: join(resolve(dir), LOG_FILE_NAME),
    onProgress: (message) => {
      if (message.startsWith("Warning:")) warnings.push(message);
      report?.(message);
    },
    finish: async (details) => {
      const entry: LogEntry = {
        timestamp: new Date(startedAt).toISOString(),
        operation,
        durationMs: now() - startedAt,
        warnings: [...warnings],
        details,
      };
      await appendLog(entry, dir);
      return entry;
    },
  };
}
