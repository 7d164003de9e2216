import { beforeEach, describe, expect, it, vi } from "vitest";

import { CredentialPool } from "@/lib/harvest/credential-pool";
import type { CredentialLease, WorkItem } from "@/lib/harvest/types";

import { RateLimitedClient } from "@/lib/github/rate-limited-client";

const NOW = Date.parse("2024-05-01T00:00:00.000Z");
const NOW_EPOCH_SECONDS = NOW / 1000;
const ENDPOINT = "https://github.test/graphql";
const ITEM: WorkItem = { owner: "octo", name: "widgets" };

const repositoryNode = {
  id: "R_kgDOTest",
  name: "widgets",
  owner: { login: "octo" },
  description: "Widget toolkit",
  stargazerCount: 12,
  forkCount: 3,
  primaryLanguage: { name: "TypeScript" },
  createdAt: "2020-01-02T03:04:05Z",
  pushedAt: "2024-04-30T10:00:00Z",
  licenseInfo: { name: "MIT License" },
  isArchived: false,
  isDisabled: false,
  isFork: false,
  url: "https://github.com/octo/widgets",
};

function jsonResponse(
  body: unknown,
  init: { status?: number; headers?: Record<string, string> } = {},
) {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    headers: { "content-type": "application/json", ...init.headers },
  });
}

function textResponse(
  body: string,
  init: { status?: number; contentType?: string } = {},
) {
  return new Response(body, {
    status: init.status ?? 200,
    headers: { "content-type": init.contentType ?? "text/html" },
  });
}

function leaseFrom(pool: CredentialPool): CredentialLease {
  const acquired = pool.acquire();
  if (acquired.kind !== "acquired") {
    throw new Error(`expected a lease, got ${acquired.kind}`);
  }
  return acquired.lease;
}

describe("RateLimitedClient", () => {
  let pool: CredentialPool;
  let respond: () => Promise<Response>;
  const fetchMock = vi.fn(async (_input: unknown, _init?: RequestInit) =>
    respond(),
  );

  function createClient() {
    return new RateLimitedClient({
      pool,
      endpoint: ENDPOINT,
      fetch: fetchMock,
      now: () => NOW,
    });
  }

  async function fetchWith(response: Response | (() => Promise<Response>)) {
    respond =
      typeof response === "function" ? response : async () => response;
    const lease = leaseFrom(pool);
    const outcome = await createClient().fetch(ITEM, lease);
    return { outcome, state: pool.snapshot()[0] };
  }

  beforeEach(() => {
    fetchMock.mockClear();
    pool = new CredentialPool(["test-token"], { now: () => NOW });
  });

  it("returns the repository payload and reports the quota", async () => {
    const { outcome, state } = await fetchWith(
      jsonResponse({
        data: {
          repository: repositoryNode,
          rateLimit: {
            limit: 5000,
            cost: 1,
            remaining: 4321,
            resetAt: "2024-05-01T01:00:00Z",
          },
        },
      }),
    );

    expect(outcome).toEqual({ kind: "success", payload: repositoryNode });
    expect(state?.remainingQuota).toBe(4321);
    expect(state?.resetAt?.toISOString()).toBe("2024-05-01T01:00:00.000Z");
    expect(state?.inFlight).toBe(0);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [input, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(input)).toBe(ENDPOINT);
    expect(new Headers(init?.headers).get("authorization")).toBe(
      "Bearer test-token",
    );
    expect(JSON.parse(String(init?.body)).variables).toEqual({
      owner: "octo",
      name: "widgets",
      topicLimit: 20,
    });
  });

  it("prefers rate limit headers over the response body", async () => {
    const { state } = await fetchWith(
      jsonResponse(
        {
          data: {
            repository: repositoryNode,
            rateLimit: { limit: 5000, cost: 1, remaining: 4321, resetAt: null },
          },
        },
        { headers: { "x-ratelimit-remaining": "17", "x-ratelimit-limit": "5000" } },
      ),
    );

    expect(state?.remainingQuota).toBe(17);
  });

  it("treats a null repository as not found", async () => {
    const { outcome } = await fetchWith(
      jsonResponse({ data: { repository: null } }),
    );
    expect(outcome).toEqual({ kind: "not_found" });
  });

  it("treats HTTP 404 and NOT_FOUND errors as not found", async () => {
    expect(
      (await fetchWith(jsonResponse({ message: "Not Found" }, { status: 404 })))
        .outcome,
    ).toEqual({ kind: "not_found" });

    expect(
      (
        await fetchWith(
          jsonResponse({
            data: { repository: null },
            errors: [
              {
                type: "NOT_FOUND",
                message: "Could not resolve to a Repository with the name 'octo/widgets'.",
              },
            ],
          }),
        )
      ).outcome,
    ).toEqual({ kind: "not_found" });
  });

  it("throttles the credential on HTTP 429", async () => {
    const { outcome, state } = await fetchWith(
      jsonResponse(
        { message: "Too many requests" },
        { status: 429, headers: { "retry-after": "30" } },
      ),
    );

    expect(outcome).toMatchObject({ kind: "rate_limited", retryAfterMs: 30_000 });
    expect(state?.remainingQuota).toBe(0);
    expect(state?.cooldownUntil?.getTime()).toBe(NOW + 30_000);
    expect(state?.inFlight).toBe(0);
  });

  it("treats HTTP 403 with an exhausted quota as a rate limit", async () => {
    const { outcome, state } = await fetchWith(
      jsonResponse(
        { message: "API rate limit exceeded" },
        {
          status: 403,
          headers: {
            "x-ratelimit-remaining": "0",
            "x-ratelimit-reset": String(NOW_EPOCH_SECONDS + 90),
          },
        },
      ),
    );

    expect(outcome).toMatchObject({ kind: "rate_limited", retryAfterMs: 90_000 });
    expect(state?.retired).toBe(false);
  });

  it("treats RATE_LIMITED GraphQL errors as a rate limit", async () => {
    const { outcome } = await fetchWith(
      jsonResponse(
        {
          data: null,
          errors: [{ type: "RATE_LIMITED", message: "API rate limit exceeded" }],
        },
        { headers: { "x-ratelimit-reset": String(NOW_EPOCH_SECONDS + 45) } },
      ),
    );

    expect(outcome).toMatchObject({ kind: "rate_limited", retryAfterMs: 45_000 });
  });

  it("retires the credential on HTTP 401", async () => {
    const { outcome, state } = await fetchWith(
      jsonResponse({ message: "Bad credentials" }, { status: 401 }),
    );

    expect(outcome).toEqual({
      kind: "auth_failed",
      cause: "Credential rejected with HTTP 401 while fetching octo/widgets: Bad credentials",
    });
    expect(state?.retired).toBe(true);
    expect(pool.usableCount()).toBe(0);
  });

  it("retires the credential on HTTP 403 without a throttle signal", async () => {
    const { outcome, state } = await fetchWith(
      jsonResponse({ message: "Resource not accessible by integration" }, { status: 403 }),
    );

    expect(outcome.kind).toBe("auth_failed");
    expect(state?.retiredReason).toBe("HTTP 403");
  });

  it("classifies server errors as transient", async () => {
    const { outcome } = await fetchWith(
      textResponse("<html>Bad gateway</html>", { status: 502 }),
    );

    expect(outcome).toEqual({
      kind: "transient_error",
      cause: "GitHub responded with HTTP 502 for octo/widgets",
    });
  });

  it("classifies GitHub timeout errors as transient", async () => {
    const { outcome } = await fetchWith(
      jsonResponse({
        data: null,
        errors: [{ message: "Something went wrong while executing your query." }],
      }),
    );

    expect(outcome.kind).toBe("transient_error");
  });

  it("classifies network failures as transient", async () => {
    const { outcome, state } = await fetchWith(async () => {
      throw new TypeError("fetch failed");
    });

    expect(outcome).toEqual({
      kind: "transient_error",
      cause: "Network error for octo/widgets: fetch failed",
    });
    expect(state?.inFlight).toBe(0);
  });

  it("classifies aborted requests as timeouts", async () => {
    const { outcome } = await fetchWith(async () => {
      throw Object.assign(new Error("The operation was aborted."), {
        name: "AbortError",
      });
    });

    expect(outcome).toEqual({
      kind: "transient_error",
      cause: "Request for octo/widgets timed out after 30000ms",
    });
  });

  it("fails fatally on bodies that are not JSON", async () => {
    const { outcome } = await fetchWith(textResponse("<html>maintenance</html>"));

    expect(outcome).toEqual({
      kind: "fatal_error",
      cause: "Unparseable response body for octo/widgets",
    });
  });

  it("fails fatally on invalid JSON", async () => {
    const { outcome } = await fetchWith(
      textResponse("{not json", { contentType: "application/json" }),
    );

    expect(outcome.kind).toBe("fatal_error");
    expect(outcome.kind === "fatal_error" && outcome.cause).toMatch(
      /^Unparseable response body for octo\/widgets: /,
    );
  });

  it("throttles on HTTP 429 even when the JSON body is truncated", async () => {
    const { outcome, state } = await fetchWith(
      new Response('{"message": "You have excee', {
        status: 429,
        headers: { "content-type": "application/json", "retry-after": "5" },
      }),
    );

    expect(outcome).toEqual({
      kind: "rate_limited",
      retryAfterMs: 5_000,
      cause: "Rate limited while fetching octo/widgets: status 429",
    });
    expect(state?.cooldownUntil?.getTime()).toBe(NOW + 5_000);
    expect(state?.inFlight).toBe(0);
  });

  it("treats server errors with a truncated JSON body as transient", async () => {
    const { outcome } = await fetchWith(
      textResponse('{"message": "Service unavail', {
        status: 503,
        contentType: "application/json",
      }),
    );

    expect(outcome).toEqual({
      kind: "transient_error",
      cause: "GitHub responded with HTTP 503 for octo/widgets",
    });
  });

  it("fails fatally when the repository payload has the wrong shape", async () => {
    const { outcome } = await fetchWith(
      jsonResponse({ data: { repository: { ...repositoryNode, id: 123 } } }),
    );

    expect(outcome).toEqual({
      kind: "fatal_error",
      cause: "Malformed repository payload for octo/widgets at id: Expected string, received number",
    });
  });

  it("fails fatally on other client errors", async () => {
    const { outcome } = await fetchWith(
      jsonResponse({ message: "Problems parsing JSON" }, { status: 400 }),
    );

    expect(outcome).toEqual({
      kind: "fatal_error",
      cause: "GitHub rejected the query for octo/widgets with HTTP 400: Problems parsing JSON",
    });
  });
});
