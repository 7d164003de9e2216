import { type WorkItem, workItemKey } from "@/lib/harvest/types";

export type FailureStage = "extract" | "load" | "dispatch";

export type RunStatus = "completed" | "cancelled" | "aborted";

export type Disposition =
  | { status: "loaded"; index: number; item: WorkItem }
  | { status: "skipped"; index: number; item: WorkItem; reason: string }
  | {
      status: "failed";
      index: number;
      item: WorkItem;
      stage: FailureStage;
      cause: string;
    };

export type SkippedDisposition = Extract<Disposition, { status: "skipped" }>;
export type FailedDisposition = Extract<Disposition, { status: "failed" }>;

export type RunReport = {
  status: RunStatus;
  abortReason: string | null;
  startedAt: Date;
  completedAt: Date;
  total: number;
  counts: {
    loaded: number;
    skipped: number;
    failed: number;
  };
  dispositions: Disposition[];
  skipped: SkippedDisposition[];
  failures: FailedDisposition[];
};

export type RunReportFinish = {
  status: RunStatus;
  abortReason?: string | null;
  completedAt: Date;
};

/**
 * Collects exactly one disposition per input index. Indexes that never
 * received one when the run ends were not dispatched and are reported as
 * failed at the `dispatch` stage.
 */
export class RunReportBuilder {
  private readonly slots: Array<Disposition | null>;

  constructor(
    private readonly items: readonly WorkItem[],
    private readonly startedAt: Date,
  ) {
    this.slots = items.map(() => null);
  }

  isSettled(index: number) {
    return this.slots[index] != null;
  }

  markLoaded(index: number) {
    this.settle({ status: "loaded", index, item: this.itemAt(index) });
  }

  markSkipped(index: number, reason: string) {
    this.settle({ status: "skipped", index, item: this.itemAt(index), reason });
  }

  markFailed(index: number, stage: FailureStage, cause: string) {
    this.settle({
      status: "failed",
      index,
      item: this.itemAt(index),
      stage,
      cause,
    });
  }

  build(finish: RunReportFinish): RunReport {
    const abortReason = finish.abortReason ?? null;
    const undispatchedCause =
      abortReason ??
      (finish.status === "cancelled"
        ? "Run cancelled before dispatch"
        : "Item was never dispatched");

    const dispositions = this.slots.map(
      (slot, index): Disposition =>
        slot ?? {
          status: "failed",
          index,
          item: this.itemAt(index),
          stage: "dispatch",
          cause: undispatchedCause,
        },
    );

    const skipped = dispositions.filter(
      (entry): entry is SkippedDisposition => entry.status === "skipped",
    );
    const failures = dispositions.filter(
      (entry): entry is FailedDisposition => entry.status === "failed",
    );

    return {
      status: finish.status,
      abortReason,
      startedAt: this.startedAt,
      completedAt: finish.completedAt,
      total: this.items.length,
      counts: {
        loaded: dispositions.length - skipped.length - failures.length,
        skipped: skipped.length,
        failed: failures.length,
      },
      dispositions,
      skipped,
      failures,
    };
  }

  private itemAt(index: number) {
    const item = this.items[index];
    if (!item) {
      throw new RangeError(`No work item at index ${index}.`);
    }

    return item;
  }

  private settle(disposition: Disposition) {
    const existing = this.slots[disposition.index];
    if (existing) {
      throw new Error(
        `Work item ${disposition.index} (${workItemKey(disposition.item)}) is already ${existing.status}.`,
      );
    }

    this.slots[disposition.index] = disposition;
  }
}

export function summarizeRunReport(report: RunReport) {
  const durationMs =
    report.completedAt.getTime() - report.startedAt.getTime();
  const lines = [
    `Run ${report.status} in ${(durationMs / 1000).toFixed(1)}s: ${report.total} item(s), ${report.counts.loaded} loaded, ${report.counts.skipped} skipped, ${report.counts.failed} failed.`,
  ];

  if (report.abortReason) {
    lines.push(`Aborted: ${report.abortReason}`);
  }

  const failuresByStage = new Map<FailureStage, number>();
  for (const failure of report.failures) {
    failuresByStage.set(
      failure.stage,
      (failuresByStage.get(failure.stage) ?? 0) + 1,
    );
  }
  for (const [stage, count] of failuresByStage) {
    lines.push(`  ${stage}: ${count} failure(s)`);
  }

  return lines.join("\n");
}
