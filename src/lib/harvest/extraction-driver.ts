import type { RepositoryNode } from "@/lib/github/repository-payload";
import type { BatchLoader } from "@/lib/harvest/batch-loader";
import type { CredentialPool } from "@/lib/harvest/credential-pool";
import type { ExecuteOptions } from "@/lib/harvest/retry-policy";
import {
  type RunReport,
  RunReportBuilder,
  type RunStatus,
} from "@/lib/harvest/run-report";
import {
  type BatchFlushResult,
  type ProjectRecord,
  type RetryResult,
  type TransformResult,
  type WorkItem,
  workItemKey,
} from "@/lib/harvest/types";
import type { HarvestLogger } from "@/lib/logging";

const DEFAULT_CONCURRENCY = 4;
const DEFAULT_PER_CREDENTIAL = 2;

export type ItemExecutor<TPayload> = {
  execute(item: WorkItem, options?: ExecuteOptions): Promise<RetryResult<TPayload>>;
};

export type ExtractionDriverOptions<TPayload, TRecord> = {
  pool: CredentialPool;
  retryPolicy: ItemExecutor<TPayload>;
  loader: BatchLoader<TRecord>;
  transform: (payload: TPayload, extractedAt: Date) => TransformResult<TRecord>;
  concurrency?: number;
  perCredential?: number;
  now?: () => number;
  logger?: HarvestLogger;
};

export type RunOptions = {
  signal?: AbortSignal;
};

function describeError(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

type RunState = {
  report: RunReportBuilder;
  stop: AbortController;
  abortReason: string | null;
};

/**
 * Runs a work list through extract, transform and load with a bounded pool
 * of workers. Item, batch and store failures become dispositions in the
 * returned {@link RunReport}; `run` itself does not reject for them.
 */
export class ExtractionDriver<TPayload = RepositoryNode, TRecord = ProjectRecord> {
  private readonly pool: CredentialPool;
  private readonly retryPolicy: ItemExecutor<TPayload>;
  private readonly loader: BatchLoader<TRecord>;
  private readonly transform: ExtractionDriverOptions<
    TPayload,
    TRecord
  >["transform"];
  private readonly concurrency: number;
  private readonly perCredential: number;
  private readonly now: () => number;
  private readonly logger?: HarvestLogger;

  constructor(options: ExtractionDriverOptions<TPayload, TRecord>) {
    this.pool = options.pool;
    this.retryPolicy = options.retryPolicy;
    this.loader = options.loader;
    this.transform = options.transform;
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
    this.perCredential = Math.max(
      1,
      options.perCredential ?? DEFAULT_PER_CREDENTIAL,
    );
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  workerCount(itemCount: number) {
    const byCredentials = this.pool.usableCount() * this.perCredential;
    const workers = Math.max(1, Math.min(this.concurrency, byCredentials));
    return Math.min(workers, itemCount);
  }

  async run(items: readonly WorkItem[], options: RunOptions = {}): Promise<RunReport> {
    const { signal } = options;
    const state: RunState = {
      report: new RunReportBuilder(items, new Date(this.now())),
      stop: new AbortController(),
      abortReason: null,
    };

    const onCancel = () => state.stop.abort();
    if (signal?.aborted) {
      onCancel();
    } else {
      signal?.addEventListener("abort", onCancel, { once: true });
    }

    const workers = this.workerCount(items.length);
    this.logger?.(
      `Harvesting ${items.length} item(s) with ${workers} worker(s) over ${this.pool.usableCount()} credential(s).`,
    );

    let cursor = 0;
    const nextIndex = () => {
      if (state.stop.signal.aborted || cursor >= items.length) {
        return null;
      }
      const index = cursor;
      cursor += 1;
      return index;
    };

    const worker = async () => {
      for (let index = nextIndex(); index !== null; index = nextIndex()) {
        try {
          await this.process(index, items[index], state);
        } catch (error) {
          if (!state.report.isSettled(index)) {
            state.report.markFailed(index, "extract", describeError(error));
          }
        }
      }
    };

    try {
      await Promise.all(Array.from({ length: workers }, () => worker()));
      this.attribute(await this.loader.flush(), state.report);
    } finally {
      signal?.removeEventListener("abort", onCancel);
    }

    const status: RunStatus = state.abortReason
      ? "aborted"
      : signal?.aborted
        ? "cancelled"
        : "completed";
    const report = state.report.build({
      status,
      abortReason: state.abortReason,
      completedAt: new Date(this.now()),
    });

    this.logger?.(
      `Run ${report.status}: ${report.counts.loaded} loaded, ${report.counts.skipped} skipped, ${report.counts.failed} failed.`,
    );
    return report;
  }

  private async process(index: number, item: WorkItem, state: RunState) {
    const label = workItemKey(item);
    const result = await this.retryPolicy.execute(item, {
      signal: state.stop.signal,
    });

    switch (result.kind) {
      case "not_found": {
        this.logger?.(`Skipping ${label}: repository not found.`);
        state.report.markSkipped(index, "Repository not found");
        return;
      }
      case "failed": {
        if (result.lastOutcome === "credentials_exhausted" && !state.abortReason) {
          state.abortReason = `All credentials exhausted: ${result.lastCause}`;
          this.logger?.(`Aborting run. ${state.abortReason}`);
          state.stop.abort();
        }
        state.report.markFailed(index, "extract", result.lastCause);
        return;
      }
      case "success": {
        const transformed = this.transform(
          result.payload,
          new Date(this.now()),
        );
        if (!transformed.ok) {
          this.logger?.(`Skipping ${label}: ${transformed.reason}`);
          state.report.markSkipped(index, transformed.reason);
          return;
        }

        const flushed = await this.loader.add({
          index,
          item,
          record: transformed.record,
        });
        this.attribute(flushed, state.report);
        return;
      }
    }
  }

  private attribute(
    result: BatchFlushResult<TRecord> | null,
    report: RunReportBuilder,
  ) {
    if (!result) {
      return;
    }

    for (const entry of result.entries) {
      if (result.status === "loaded") {
        report.markLoaded(entry.index);
      } else {
        report.markFailed(entry.index, "load", result.error);
      }
    }
  }
}
