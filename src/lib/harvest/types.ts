import type { RepositoryNode } from "@/lib/github/repository-payload";

export type WorkItem = {
  readonly owner: string;
  readonly name: string;
  readonly displayName?: string | null;
  readonly downloads?: number | null;
};

export function workItemKey(item: WorkItem) {
  return `${item.owner}/${item.name}`;
}

export type CredentialLease = {
  readonly leaseId: number;
  readonly credentialId: string;
  readonly token: string;
};

export type RateLimitSnapshot = {
  remaining: number | null;
  limit: number | null;
  resetAt: Date | null;
};

export type FetchOutcome<TPayload = RepositoryNode> =
  | { kind: "success"; payload: TPayload }
  | { kind: "rate_limited"; retryAfterMs: number; cause: string }
  | { kind: "auth_failed"; cause: string }
  | { kind: "not_found" }
  | { kind: "transient_error"; cause: string }
  | { kind: "fatal_error"; cause: string };

export type FetchOutcomeKind = FetchOutcome["kind"];

export interface WorkItemFetcher<TPayload = RepositoryNode> {
  fetch(item: WorkItem, lease: CredentialLease): Promise<FetchOutcome<TPayload>>;
}

export type RetryFailureKind =
  | Exclude<FetchOutcomeKind, "success" | "not_found">
  | "credentials_exhausted"
  | "cancelled";

export type RetryResult<TPayload = RepositoryNode> =
  | { kind: "success"; payload: TPayload; attempts: number }
  | { kind: "not_found"; attempts: number }
  | {
      kind: "failed";
      item: WorkItem;
      lastCause: string;
      lastOutcome: RetryFailureKind;
      attempts: number;
    };

export type ProjectRecord = {
  id: string;
  name: string;
  ownerLogin: string;
  description: string | null;
  stargazerCount: number | null;
  forkCount: number | null;
  primaryLanguage: string | null;
  createdAt: Date | null;
  pushedAt: Date | null;
  licenseName: string | null;
  isArchived: boolean | null;
  isDisabled: boolean | null;
  isFork: boolean | null;
  url: string | null;
  lastExtractedAt: Date;
  topics: string[];
};

export type TransformResult<TRecord = ProjectRecord> =
  | { ok: true; record: TRecord }
  | { ok: false; reason: string };

export type BatchEntry<TRecord = ProjectRecord> = {
  index: number;
  item: WorkItem;
  record: TRecord;
};

export type BatchFlushResult<TRecord = ProjectRecord> =
  | { status: "loaded"; entries: BatchEntry<TRecord>[]; attempts: number }
  | {
      status: "failed";
      entries: BatchEntry<TRecord>[];
      attempts: number;
      error: string;
    };

export interface ProjectStore<TRecord = ProjectRecord> {
  ensureSchema(): Promise<void>;
  upsertBatch(records: TRecord[]): Promise<void>;
}
