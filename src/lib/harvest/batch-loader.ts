import {
  describeDatabaseError,
  isTransientDatabaseError,
} from "@/lib/db/errors";
import {
  exponentialBackoffMs,
  type Sleep,
  sleep as defaultSleep,
} from "@/lib/harvest/timing";
import type {
  BatchEntry,
  BatchFlushResult,
  ProjectRecord,
  ProjectStore,
} from "@/lib/harvest/types";
import { PromiseLock } from "@/lib/jobs/lock";
import type { HarvestLogger } from "@/lib/logging";

const DEFAULT_BATCH_SIZE = 100;
const DEFAULT_MAX_BATCH_AGE_MS = 30_000;
const DEFAULT_MAX_FLUSH_ATTEMPTS = 3;
const DEFAULT_RETRY_BASE_DELAY_MS = 500;

export type BatchLoaderOptions<TRecord> = {
  naturalKey: (record: TRecord) => string;
  batchSize?: number;
  maxBatchAgeMs?: number;
  maxFlushAttempts?: number;
  retryBaseDelayMs?: number;
  isTransientError?: (error: unknown) => boolean;
  describeError?: (error: unknown) => string;
  sleep?: Sleep;
  now?: () => number;
  logger?: HarvestLogger;
};

/**
 * Buffers transformed records and writes them to the store in upsert
 * batches. A batch is flushed when it reaches `batchSize` or when an add
 * finds its oldest entry older than `maxBatchAgeMs`. Every flush result
 * carries the entries it covered so callers can attribute it per item.
 */
export class BatchLoader<TRecord = ProjectRecord> {
  private buffer: BatchEntry<TRecord>[] = [];
  private oldestEntryAt: number | null = null;
  private readonly lock = new PromiseLock();
  private readonly naturalKey: (record: TRecord) => string;
  private readonly batchSize: number;
  private readonly maxBatchAgeMs: number;
  private readonly maxFlushAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly isTransientError: (error: unknown) => boolean;
  private readonly describeError: (error: unknown) => string;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly logger?: HarvestLogger;

  constructor(
    private readonly store: ProjectStore<TRecord>,
    options: BatchLoaderOptions<TRecord>,
  ) {
    this.naturalKey = options.naturalKey;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.maxBatchAgeMs = options.maxBatchAgeMs ?? DEFAULT_MAX_BATCH_AGE_MS;
    this.maxFlushAttempts = Math.max(
      1,
      options.maxFlushAttempts ?? DEFAULT_MAX_FLUSH_ATTEMPTS,
    );
    this.retryBaseDelayMs =
      options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    this.isTransientError = options.isTransientError ?? isTransientDatabaseError;
    this.describeError = options.describeError ?? describeDatabaseError;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  get pendingCount() {
    return this.buffer.length;
  }

  async ensureSchema() {
    await this.store.ensureSchema();
  }

  add(entry: BatchEntry<TRecord>): Promise<BatchFlushResult<TRecord> | null> {
    return this.lock.run(async () => {
      const now = this.now();
      const oldestEntryAt = this.oldestEntryAt ?? now;
      this.buffer.push(entry);
      this.oldestEntryAt = oldestEntryAt;

      const full = this.buffer.length >= this.batchSize;
      const stale = now - oldestEntryAt >= this.maxBatchAgeMs;
      if (!full && !stale) {
        return null;
      }

      return this.flushBuffer();
    });
  }

  flush(): Promise<BatchFlushResult<TRecord> | null> {
    return this.lock.run(() => this.flushBuffer());
  }

  private async flushBuffer(): Promise<BatchFlushResult<TRecord> | null> {
    const entries = this.buffer;
    this.buffer = [];
    this.oldestEntryAt = null;

    if (!entries.length) {
      return null;
    }

    const byKey = new Map<string, TRecord>();
    for (const entry of entries) {
      byKey.set(this.naturalKey(entry.record), entry.record);
    }
    const records = Array.from(byKey.values());

    let attempts = 0;
    while (true) {
      attempts += 1;
      try {
        await this.store.upsertBatch(records);
        this.logger?.(
          `Loaded batch of ${records.length} record(s) (${entries.length} item(s)) in ${attempts} attempt(s).`,
        );
        return { status: "loaded", entries, attempts };
      } catch (error) {
        const message = this.describeError(error);
        const retryable =
          this.isTransientError(error) && attempts < this.maxFlushAttempts;
        if (!retryable) {
          this.logger?.(
            `Batch of ${records.length} record(s) failed after ${attempts} attempt(s): ${message}`,
          );
          return { status: "failed", entries, attempts, error: message };
        }

        const waitMs = exponentialBackoffMs(this.retryBaseDelayMs, attempts - 1);
        this.logger?.(
          `Retrying batch load (${attempts}/${this.maxFlushAttempts}) in ${waitMs}ms after ${message}`,
        );
        await this.sleep(waitMs);
      }
    }
  }
}
