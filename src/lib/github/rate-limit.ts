import type { RateLimitBlock } from "@/lib/github/repository-payload";
import type { RateLimitSnapshot } from "@/lib/harvest/types";

const RATE_LIMIT_ERROR_CODES = new Set([
  "RATE_LIMIT",
  "RATE_LIMITED",
  "GRAPHQL_RATE_LIMIT",
  "graphql_rate_limit",
]);

const DELAY_EXTENSION_KEYS = [
  "retryAfter",
  "retry_after",
  "retryAfterSeconds",
  "retry_after_seconds",
  "wait",
  "seconds",
  "resetAfter",
  "reset_after",
];

const RESET_EXTENSION_KEYS = ["resetAt", "reset_at", "resetTime", "reset_time"];

export function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== "object") {
    return null;
  }

  return value as Record<string, unknown>;
}

export function getHeaderValue(headers: unknown, key: string): string | null {
  if (!headers) {
    return null;
  }

  const headerKey = key.toLowerCase();
  if (headers instanceof Headers) {
    const headerValue = headers.get(headerKey);
    return headerValue && headerValue.length > 0 ? headerValue : null;
  }

  const record = asRecord(headers);
  if (!record) {
    return null;
  }

  for (const [rawKey, value] of Object.entries(record)) {
    if (rawKey.toLowerCase() !== headerKey) {
      continue;
    }

    if (typeof value === "string") {
      return value;
    }

    if (Array.isArray(value)) {
      const firstValue = value.find((item) => typeof item === "string");
      if (typeof firstValue === "string") {
        return firstValue;
      }
    }

    if (value != null) {
      return String(value);
    }
  }

  return null;
}

function parseNumber(value: string | null): number | null {
  if (value === null) {
    return null;
  }

  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  const numeric = Number(trimmed);
  return Number.isFinite(numeric) ? numeric : null;
}

/**
 * `retry-after` is either delta-seconds or an HTTP date.
 */
export function parseRetryAfterHeader(
  value: string,
  now: number,
): number | null {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  const numeric = Number(trimmed);
  if (Number.isFinite(numeric)) {
    return numeric <= 0 ? 0 : numeric * 1000;
  }

  const timestamp = Date.parse(trimmed);
  if (Number.isNaN(timestamp)) {
    return null;
  }

  return Math.max(0, timestamp - now);
}

/**
 * `x-ratelimit-reset` is epoch seconds; the GraphQL `rateLimit.resetAt` field
 * is an ISO timestamp. Both are accepted.
 */
export function parseResetValue(value: unknown): Date | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return new Date(value * 1000);
  }

  if (typeof value !== "string" || value.trim().length === 0) {
    return null;
  }

  const numeric = Number(value.trim());
  if (Number.isFinite(numeric)) {
    return new Date(numeric * 1000);
  }

  const timestamp = Date.parse(value);
  return Number.isNaN(timestamp) ? null : new Date(timestamp);
}

function parseExtensionDelay(value: unknown, now: number): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value <= 0 ? 0 : value * 1000;
  }

  if (typeof value === "string" && value.trim().length > 0) {
    return parseRetryAfterHeader(value, now);
  }

  return null;
}

export function readRateLimitSnapshot(
  headers: unknown,
  block: RateLimitBlock | null | undefined,
): RateLimitSnapshot | null {
  const remaining =
    parseNumber(getHeaderValue(headers, "x-ratelimit-remaining")) ??
    block?.remaining ??
    null;
  const limit =
    parseNumber(getHeaderValue(headers, "x-ratelimit-limit")) ??
    block?.limit ??
    null;
  const resetAt =
    parseResetValue(getHeaderValue(headers, "x-ratelimit-reset")) ??
    parseResetValue(block?.resetAt);

  if (remaining === null && limit === null && resetAt === null) {
    return null;
  }

  return { remaining, limit, resetAt };
}

function collectErrorMarkers(error: unknown): string[] {
  const errorRecord = asRecord(error);
  if (!errorRecord) {
    return [];
  }

  const markers: string[] = [];
  for (const candidate of [errorRecord.type, errorRecord.code]) {
    if (typeof candidate === "string") {
      markers.push(candidate);
    }
  }

  const extensionsRecord = asRecord(errorRecord.extensions);
  if (extensionsRecord) {
    for (const candidate of [extensionsRecord.type, extensionsRecord.code]) {
      if (typeof candidate === "string") {
        markers.push(candidate);
      }
    }
  }

  return markers;
}

export function hasRateLimitMarker(errors: readonly unknown[]) {
  return errors.some((entry) =>
    collectErrorMarkers(entry).some((marker) =>
      RATE_LIMIT_ERROR_CODES.has(marker),
    ),
  );
}

export function hasNotFoundMarker(errors: readonly unknown[]) {
  return errors.some((entry) =>
    collectErrorMarkers(entry).includes("NOT_FOUND"),
  );
}

export function getRateLimitRetryDelayMs(params: {
  headers: unknown;
  errors: readonly unknown[];
  now: number;
  defaultDelayMs: number;
}): number {
  const { headers, errors, now, defaultDelayMs } = params;

  const retryAfterHeader = getHeaderValue(headers, "retry-after");
  if (retryAfterHeader !== null) {
    const delayFromHeader = parseRetryAfterHeader(retryAfterHeader, now);
    if (delayFromHeader !== null) {
      return delayFromHeader;
    }
  }

  const resetFromHeader = parseResetValue(
    getHeaderValue(headers, "x-ratelimit-reset"),
  );
  if (resetFromHeader) {
    return Math.max(0, resetFromHeader.getTime() - now);
  }

  for (const graphqlError of errors) {
    const extensionsRecord = asRecord(asRecord(graphqlError)?.extensions);
    if (!extensionsRecord) {
      continue;
    }

    for (const key of DELAY_EXTENSION_KEYS) {
      const extensionDelay = parseExtensionDelay(extensionsRecord[key], now);
      if (extensionDelay !== null) {
        return extensionDelay;
      }
    }

    for (const key of RESET_EXTENSION_KEYS) {
      const extensionReset = parseResetValue(extensionsRecord[key]);
      if (extensionReset) {
        return Math.max(0, extensionReset.getTime() - now);
      }
    }
  }

  return defaultDelayMs;
}
