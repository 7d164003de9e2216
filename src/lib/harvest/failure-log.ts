import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";

import type { FailureStage, RunReport } from "@/lib/harvest/run-report";
import { workItemKey } from "@/lib/harvest/types";

export type FailureLogEntry = {
  timestamp: string;
  runStartedAt: string;
  item: string;
  stage: FailureStage;
  cause: string;
};

export function buildFailureLogEntries(
  report: RunReport,
  timestamp: Date = new Date(),
): FailureLogEntry[] {
  return report.failures.map((failure) => ({
    timestamp: timestamp.toISOString(),
    runStartedAt: report.startedAt.toISOString(),
    item: workItemKey(failure.item),
    stage: failure.stage,
    cause: failure.cause,
  }));
}

export function formatFailureLog(entries: readonly FailureLogEntry[]) {
  return entries.map((entry) => `${JSON.stringify(entry)}\n`).join("");
}

/**
 * Appends one JSON line per failed item. Returns the number of lines written.
 */
export async function appendFailureLog(
  filePath: string,
  report: RunReport,
  timestamp: Date = new Date(),
) {
  const entries = buildFailureLogEntries(report, timestamp);
  if (!entries.length) {
    return 0;
  }

  await mkdir(path.dirname(filePath), { recursive: true });
  await appendFile(filePath, formatFailureLog(entries), "utf8");
  return entries.length;
}
