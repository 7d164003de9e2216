import type { RepositoryNode } from "@/lib/github/repository-payload";
import type { CredentialPool } from "@/lib/harvest/credential-pool";
import {
  exponentialBackoffMs,
  type Sleep,
  sleep as defaultSleep,
  withJitter,
} from "@/lib/harvest/timing";
import {
  type RetryFailureKind,
  type RetryResult,
  type WorkItem,
  type WorkItemFetcher,
  workItemKey,
} from "@/lib/harvest/types";
import type { HarvestLogger } from "@/lib/logging";

const DEFAULT_MAX_ATTEMPTS = 5;
const DEFAULT_BASE_DELAY_MS = 1_000;
const DEFAULT_JITTER_RATIO = 0.2;
const DEFAULT_MAX_BLOCKED_WAIT_MS = 60 * 60 * 1000;

export type RetryPolicyOptions<TPayload> = {
  pool: CredentialPool;
  fetcher: WorkItemFetcher<TPayload>;
  maxAttempts?: number;
  baseDelayMs?: number;
  jitterRatio?: number;
  maxBlockedWaitMs?: number;
  sleep?: Sleep;
  now?: () => number;
  random?: () => number;
  logger?: HarvestLogger;
};

export type ExecuteOptions = {
  signal?: AbortSignal;
};

/**
 * Drives one WorkItem to a terminal result.
 *
 * | outcome           | slot consumed | next step                                  |
 * | ----------------- | ------------- | ------------------------------------------ |
 * | success           | yes           | return                                     |
 * | not_found         | yes           | return                                     |
 * | fatal_error       | yes           | return failed                              |
 * | auth_failed       | no            | retry at once, another credential          |
 * | rate_limited      | yes           | backoff max(retryAfter, base·2^n), rotate  |
 * | transient_error   | yes           | backoff base·2^n                           |
 * | pool blocked      | no            | sleep until the pool frees a credential    |
 * | pool exhausted    | no            | return failed(credentials_exhausted)       |
 */
export class RetryPolicy<TPayload = RepositoryNode> {
  private readonly pool: CredentialPool;
  private readonly fetcher: WorkItemFetcher<TPayload>;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly jitterRatio: number;
  private readonly maxBlockedWaitMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly logger?: HarvestLogger;

  constructor(options: RetryPolicyOptions<TPayload>) {
    this.pool = options.pool;
    this.fetcher = options.fetcher;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.jitterRatio = options.jitterRatio ?? DEFAULT_JITTER_RATIO;
    this.maxBlockedWaitMs =
      options.maxBlockedWaitMs ?? DEFAULT_MAX_BLOCKED_WAIT_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
    this.logger = options.logger;
  }

  async execute(
    item: WorkItem,
    options: ExecuteOptions = {},
  ): Promise<RetryResult<TPayload>> {
    const { signal } = options;
    const label = workItemKey(item);
    let attempts = 0;
    let authFailures = 0;
    let blockedWaitMs = 0;
    let avoid: string | null = null;
    let lastCause = `No attempt completed for ${label}`;
    let lastOutcome: RetryFailureKind = "transient_error";

    const failed = (
      outcome: RetryFailureKind,
      cause: string,
    ): RetryResult<TPayload> => ({
      kind: "failed",
      item,
      lastCause: cause,
      lastOutcome: outcome,
      attempts,
    });
    const cancelled = () =>
      failed("cancelled", `Run cancelled before ${label} completed`);

    while (attempts < this.maxAttempts) {
      if (signal?.aborted) {
        return cancelled();
      }

      const acquired = this.pool.acquire({ avoid });
      if (acquired.kind === "exhausted") {
        return failed(
          "credentials_exhausted",
          `No usable credentials remain for ${label}`,
        );
      }

      if (acquired.kind === "blocked") {
        const waitMs = Math.max(0, acquired.waitUntil.getTime() - this.now());
        if (blockedWaitMs + waitMs > this.maxBlockedWaitMs) {
          return failed(
            "rate_limited",
            `Rate limit wait of ${Math.ceil(waitMs / 1000)}s for ${label} exceeds the ${Math.ceil(this.maxBlockedWaitMs / 1000)}s budget`,
          );
        }

        blockedWaitMs += waitMs;
        if (waitMs >= 1_000) {
          this.logger?.(
            `All credentials busy for ${label}. Waiting ${Math.ceil(waitMs / 1000)}s until ${acquired.waitUntil.toISOString()}.`,
          );
        }
        if (!(await this.pause(waitMs, signal))) {
          return cancelled();
        }
        continue;
      }

      const { lease } = acquired;
      const outcome = await this.fetcher.fetch(item, lease);

      switch (outcome.kind) {
        case "success":
          return { kind: "success", payload: outcome.payload, attempts: attempts + 1 };
        case "not_found":
          return { kind: "not_found", attempts: attempts + 1 };
        case "fatal_error":
          attempts += 1;
          return failed("fatal_error", outcome.cause);
        case "auth_failed": {
          authFailures += 1;
          lastCause = outcome.cause;
          lastOutcome = "auth_failed";
          avoid = lease.credentialId;
          this.logger?.(`${outcome.cause}. Retrying ${label} with another credential.`);
          if (authFailures > this.pool.size) {
            return failed("auth_failed", outcome.cause);
          }
          continue;
        }
        case "rate_limited": {
          const attemptIndex = attempts;
          attempts += 1;
          lastCause = outcome.cause;
          lastOutcome = "rate_limited";
          avoid = lease.credentialId;
          if (attempts >= this.maxAttempts) {
            break;
          }

          const waitMs = withJitter(
            Math.max(
              outcome.retryAfterMs,
              exponentialBackoffMs(this.baseDelayMs, attemptIndex),
            ),
            this.jitterRatio,
            this.random,
          );
          this.logger?.(
            `Rate limit reached for ${label}. Waiting ${Math.ceil(waitMs / 1000)}s before retrying (${attempts}/${this.maxAttempts}).`,
          );
          if (!(await this.pause(waitMs, signal))) {
            return cancelled();
          }
          break;
        }
        case "transient_error": {
          const attemptIndex = attempts;
          attempts += 1;
          lastCause = outcome.cause;
          lastOutcome = "transient_error";
          avoid = null;
          if (attempts >= this.maxAttempts) {
            break;
          }

          const waitMs = withJitter(
            exponentialBackoffMs(this.baseDelayMs, attemptIndex),
            this.jitterRatio,
            this.random,
          );
          this.logger?.(
            `Retrying ${label} (${attempts}/${this.maxAttempts}) after ${outcome.cause}...`,
          );
          if (!(await this.pause(waitMs, signal))) {
            return cancelled();
          }
          break;
        }
      }
    }

    return failed(lastOutcome, lastCause);
  }

  private async pause(ms: number, signal?: AbortSignal) {
    if (ms <= 0) {
      return !signal?.aborted;
    }

    try {
      await this.sleep(ms, signal);
      return true;
    } catch (error) {
      if (signal?.aborted) {
        return false;
      }
      throw error;
    }
  }
}
