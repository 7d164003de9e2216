import { describe, expect, it } from "vitest";

import { RunReportBuilder, summarizeRunReport } from "@/lib/harvest/run-report";
import type { WorkItem } from "@/lib/harvest/types";

const ITEMS: WorkItem[] = [
  { owner: "octo", name: "one" },
  { owner: "octo", name: "two" },
  { owner: "octo", name: "three" },
  { owner: "octo", name: "one" },
];
const STARTED_AT = new Date("2024-05-01T00:00:00.000Z");
const COMPLETED_AT = new Date("2024-05-01T00:00:12.500Z");

describe("RunReportBuilder", () => {
  it("keeps one disposition per input index, duplicates included", () => {
    const builder = new RunReportBuilder(ITEMS, STARTED_AT);
    builder.markLoaded(0);
    builder.markSkipped(1, "Repository not found");
    builder.markFailed(2, "load", "duplicate key value");
    builder.markLoaded(3);

    const report = builder.build({ status: "completed", completedAt: COMPLETED_AT });

    expect(report.counts).toEqual({ loaded: 2, skipped: 1, failed: 1 });
    expect(report.dispositions.map((entry) => entry.status)).toEqual([
      "loaded",
      "skipped",
      "failed",
      "loaded",
    ]);
    expect(report.skipped).toEqual([
      { status: "skipped", index: 1, item: ITEMS[1], reason: "Repository not found" },
    ]);
    expect(report.failures).toEqual([
      {
        status: "failed",
        index: 2,
        item: ITEMS[2],
        stage: "load",
        cause: "duplicate key value",
      },
    ]);
    expect(report.abortReason).toBeNull();
  });

  it("rejects a second disposition for the same index", () => {
    const builder = new RunReportBuilder(ITEMS, STARTED_AT);
    builder.markLoaded(0);

    expect(() => builder.markFailed(0, "load", "late failure")).toThrow(
      "Work item 0 (octo/one) is already loaded.",
    );
  });

  it("fails undispatched items at the dispatch stage", () => {
    const builder = new RunReportBuilder(ITEMS, STARTED_AT);
    builder.markLoaded(0);

    const cancelled = builder.build({ status: "cancelled", completedAt: COMPLETED_AT });
    expect(cancelled.failures.map((entry) => [entry.index, entry.stage, entry.cause])).toEqual([
      [1, "dispatch", "Run cancelled before dispatch"],
      [2, "dispatch", "Run cancelled before dispatch"],
      [3, "dispatch", "Run cancelled before dispatch"],
    ]);

    const aborted = builder.build({
      status: "aborted",
      abortReason: "All credentials exhausted",
      completedAt: COMPLETED_AT,
    });
    expect(aborted.failures[0]?.cause).toBe("All credentials exhausted");
    expect(aborted.counts).toEqual({ loaded: 1, skipped: 0, failed: 3 });
  });

  it("summarizes counts, abort reason and failure stages", () => {
    const builder = new RunReportBuilder(ITEMS, STARTED_AT);
    builder.markLoaded(0);
    builder.markFailed(1, "extract", "HTTP 502");

    const report = builder.build({
      status: "aborted",
      abortReason: "All credentials exhausted",
      completedAt: COMPLETED_AT,
    });

    expect(summarizeRunReport(report)).toBe(
      [
        "Run aborted in 12.5s: 4 item(s), 1 loaded, 0 skipped, 3 failed.",
        "Aborted: All credentials exhausted",
        "  extract: 1 failure(s)",
        "  dispatch: 2 failure(s)",
      ].join("\n"),
    );
  });
});
