import { ClientError } from "graphql-request";

import { createGithubClient } from "@/lib/github/client";
import {
  REPOSITORY_TOPIC_LIMIT,
  type RepositoryMetadataVariables,
  repositoryMetadataQuery,
} from "@/lib/github/queries";
import {
  asRecord,
  getHeaderValue,
  getRateLimitRetryDelayMs,
  hasNotFoundMarker,
  hasRateLimitMarker,
  readRateLimitSnapshot,
} from "@/lib/github/rate-limit";
import {
  type RepositoryNode,
  rateLimitBlockSchema,
  repositoryNodeSchema,
  repositoryQueryResponseSchema,
} from "@/lib/github/repository-payload";
import type { CredentialPool } from "@/lib/harvest/credential-pool";
import type {
  CredentialLease,
  FetchOutcome,
  WorkItem,
  WorkItemFetcher,
} from "@/lib/harvest/types";
import { workItemKey } from "@/lib/harvest/types";

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_RATE_LIMIT_DELAY_MS = 60_000;
const TRANSIENT_GRAPHQL_MESSAGE = /timeout|timed out|something went wrong/i;

export type RateLimitedClientOptions = {
  pool: CredentialPool;
  endpoint?: string;
  fetch?: typeof fetch;
  timeoutMs?: number;
  defaultRateLimitDelayMs?: number;
  now?: () => number;
};

type ClientErrorDetails = {
  status: number;
  headers: unknown;
  errors: unknown[];
  message: string | null;
  rawBody: string | null;
  data: unknown;
};

function readClientError(error: ClientError): ClientErrorDetails {
  const response = asRecord(error.response) ?? {};
  const status = typeof response.status === "number" ? response.status : 0;
  const errors = Array.isArray(response.errors) ? response.errors : [];

  return {
    status,
    headers: response.headers ?? null,
    errors,
    message: typeof response.message === "string" ? response.message : null,
    rawBody: typeof response.error === "string" ? response.error : null,
    data: response.data ?? null,
  };
}

function describeGraphqlErrors(errors: readonly unknown[]) {
  const messages = errors
    .map((entry) => {
      const message = asRecord(entry)?.message;
      return typeof message === "string" ? message.trim() : null;
    })
    .filter((message): message is string => Boolean(message));

  return messages.length ? messages.join("; ") : null;
}

function isSecondaryRateLimit(details: ClientErrorDetails) {
  if (getHeaderValue(details.headers, "retry-after") !== null) {
    return true;
  }

  if (getHeaderValue(details.headers, "x-ratelimit-remaining")?.trim() === "0") {
    return true;
  }

  const text = [details.message, describeGraphqlErrors(details.errors)]
    .filter(Boolean)
    .join(" ");
  return /rate limit/i.test(text);
}

type ObservedResponse = {
  status: number;
  headers: Headers;
};

/**
 * graphql-request parses a JSON body before it checks the status, so a
 * truncated error body surfaces as a bare `SyntaxError`. The recorder keeps
 * the status and headers of the last response for that case.
 */
function recordResponses(baseFetch: typeof fetch) {
  let last: ObservedResponse | null = null;

  const recordingFetch = async (...args: Parameters<typeof fetch>) => {
    const response = await baseFetch(...args);
    last = { status: response.status, headers: response.headers };
    return response;
  };

  return {
    fetch: recordingFetch,
    lastResponse: (): ObservedResponse | null => last,
  };
}

function isAbortError(error: unknown) {
  return (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

function describeError(error: unknown) {
  if (error instanceof Error) {
    const cause = asRecord(error.cause);
    const causeCode = typeof cause?.code === "string" ? ` (${cause.code})` : "";
    return `${error.message}${causeCode}`;
  }

  return "unknown error";
}

/**
 * Issues one repository query per call and turns whatever comes back into a
 * {@link FetchOutcome}. The lease is always settled before returning: quota
 * headers are reported, throttled credentials cool down, rejected ones retire.
 */
export class RateLimitedClient implements WorkItemFetcher<RepositoryNode> {
  private readonly pool: CredentialPool;
  private readonly endpoint?: string;
  private readonly fetchImpl?: typeof fetch;
  private readonly timeoutMs: number;
  private readonly defaultRateLimitDelayMs: number;
  private readonly now: () => number;

  constructor(options: RateLimitedClientOptions) {
    this.pool = options.pool;
    this.endpoint = options.endpoint;
    this.fetchImpl = options.fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.defaultRateLimitDelayMs =
      options.defaultRateLimitDelayMs ?? DEFAULT_RATE_LIMIT_DELAY_MS;
    this.now = options.now ?? Date.now;
  }

  async fetch(
    item: WorkItem,
    lease: CredentialLease,
  ): Promise<FetchOutcome<RepositoryNode>> {
    const recorder = recordResponses(this.fetchImpl ?? fetch);
    const client = createGithubClient(lease.token, {
      endpoint: this.endpoint,
      fetch: recorder.fetch,
    });
    const timeoutSignal = AbortSignal.timeout(this.timeoutMs);

    try {
      const response = await client.rawRequest<
        unknown,
        RepositoryMetadataVariables
      >({
        query: repositoryMetadataQuery,
        variables: {
          owner: item.owner,
          name: item.name,
          topicLimit: REPOSITORY_TOPIC_LIMIT,
        },
        signal: timeoutSignal,
      });

      return this.classifyResponse(item, lease, response.data, response.headers);
    } catch (error) {
      return this.classifyError(
        item,
        lease,
        error,
        timeoutSignal.aborted,
        recorder.lastResponse(),
      );
    } finally {
      this.pool.release(lease);
    }
  }

  private classifyResponse(
    item: WorkItem,
    lease: CredentialLease,
    data: unknown,
    headers: unknown,
  ): FetchOutcome<RepositoryNode> {
    const parsed = repositoryQueryResponseSchema.safeParse(data);
    if (!parsed.success) {
      return {
        kind: "fatal_error",
        cause: `Unexpected response shape for ${workItemKey(item)}: ${parsed.error.issues[0]?.message ?? "invalid payload"}`,
      };
    }

    const snapshot = readRateLimitSnapshot(headers, parsed.data.rateLimit);
    if (snapshot) {
      this.pool.report(lease, snapshot);
    }

    if (parsed.data.repository == null) {
      return { kind: "not_found" };
    }

    const repository = repositoryNodeSchema.safeParse(parsed.data.repository);
    if (!repository.success) {
      const issue = repository.error.issues[0];
      const location = issue?.path.join(".") || "repository";
      return {
        kind: "fatal_error",
        cause: `Malformed repository payload for ${workItemKey(item)} at ${location}: ${issue?.message ?? "invalid value"}`,
      };
    }

    return { kind: "success", payload: repository.data };
  }

  private classifyError(
    item: WorkItem,
    lease: CredentialLease,
    error: unknown,
    timedOut: boolean,
    observed: ObservedResponse | null,
  ): FetchOutcome<RepositoryNode> {
    const label = workItemKey(item);

    if (error instanceof ClientError) {
      return this.classifyClientError(label, lease, readClientError(error));
    }

    if (error instanceof SyntaxError) {
      if (observed && (observed.status < 200 || observed.status >= 300)) {
        return this.classifyClientError(label, lease, {
          status: observed.status,
          headers: observed.headers,
          errors: [],
          message: null,
          rawBody: null,
          data: null,
        });
      }

      return {
        kind: "fatal_error",
        cause: `Unparseable response body for ${label}: ${error.message}`,
      };
    }

    if (timedOut || isAbortError(error)) {
      return {
        kind: "transient_error",
        cause: `Request for ${label} timed out after ${this.timeoutMs}ms`,
      };
    }

    return {
      kind: "transient_error",
      cause: `Network error for ${label}: ${describeError(error)}`,
    };
  }

  private classifyClientError(
    label: string,
    lease: CredentialLease,
    details: ClientErrorDetails,
  ): FetchOutcome<RepositoryNode> {
    const { status, headers, errors } = details;
    const graphqlMessage = describeGraphqlErrors(errors);
    const detail = graphqlMessage ?? details.message ?? `status ${status}`;

    if (
      status === 429 ||
      hasRateLimitMarker(errors) ||
      (status === 403 && isSecondaryRateLimit(details))
    ) {
      const retryAfterMs = getRateLimitRetryDelayMs({
        headers,
        errors,
        now: this.now(),
        defaultDelayMs: this.defaultRateLimitDelayMs,
      });
      this.pool.throttle(lease, retryAfterMs);
      return {
        kind: "rate_limited",
        retryAfterMs,
        cause: `Rate limited while fetching ${label}: ${detail}`,
      };
    }

    if (status === 401 || status === 403) {
      const cause = `Credential rejected with HTTP ${status} while fetching ${label}: ${detail}`;
      this.pool.retire(lease, `HTTP ${status}`);
      return { kind: "auth_failed", cause };
    }

    const rateLimitBlock = rateLimitBlockSchema.safeParse(
      asRecord(details.data)?.rateLimit,
    );
    const snapshot = readRateLimitSnapshot(
      headers,
      rateLimitBlock.success ? rateLimitBlock.data : null,
    );
    if (snapshot) {
      this.pool.report(lease, snapshot);
    }

    if (status === 404 || hasNotFoundMarker(errors)) {
      return { kind: "not_found" };
    }

    if (status === 408 || status >= 500) {
      return {
        kind: "transient_error",
        cause: `GitHub responded with HTTP ${status} for ${label}`,
      };
    }

    if (status >= 200 && status < 300) {
      if (details.rawBody !== null && !errors.length) {
        return {
          kind: "fatal_error",
          cause: `Unparseable response body for ${label}`,
        };
      }

      if (graphqlMessage && TRANSIENT_GRAPHQL_MESSAGE.test(graphqlMessage)) {
        return {
          kind: "transient_error",
          cause: `GitHub query for ${label} failed: ${graphqlMessage}`,
        };
      }

      return {
        kind: "fatal_error",
        cause: `GitHub query for ${label} failed: ${detail}`,
      };
    }

    return {
      kind: "fatal_error",
      cause: `GitHub rejected the query for ${label} with HTTP ${status}: ${detail}`,
    };
  }
}
