import "@/lib/logging";

import path from "node:path";

import { z } from "zod";

import { MAX_PROJECT_ROWS_PER_STATEMENT } from "@/lib/db/limits";

function coerceOptionalString(value: unknown) {
  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function normalizeOptionalEnv(value: unknown) {
  return coerceOptionalString(value) ?? undefined;
}

function optionalInteger(
  name: string,
  bounds: { min: number; max?: number },
) {
  let schema = z
    .number()
    .int({ message: `${name} must be an integer.` })
    .min(bounds.min, `${name} must be at least ${bounds.min}.`);
  if (bounds.max !== undefined) {
    schema = schema.max(bounds.max, `${name} cannot exceed ${bounds.max}.`);
  }

  return z.preprocess(
    normalizeOptionalEnv,
    z
      .string()
      .transform((value) => Number.parseInt(value, 10))
      .optional()
      .pipe(schema.optional()),
  );
}

export function splitTokenList(value: string | null | undefined): string[] {
  if (!value) {
    return [];
  }

  return value
    .split(",")
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

const envSchema = z.object({
  GITHUB_TOKENS: z.preprocess(normalizeOptionalEnv, z.string().optional()),
  GITHUB_APP_INSTALLATION_TOKENS: z.preprocess(
    normalizeOptionalEnv,
    z.string().optional(),
  ),
  GITHUB_TOKEN: z.preprocess(normalizeOptionalEnv, z.string().optional()),
  GITHUB_GRAPHQL_URL: z.preprocess(
    normalizeOptionalEnv,
    z
      .string()
      .url(
        "GITHUB_GRAPHQL_URL must be an absolute URL (for example https://api.github.com/graphql).",
      )
      .optional(),
  ),
  DATABASE_URL: z.preprocess(
    normalizeOptionalEnv,
    z.string().min(1, "Set DATABASE_URL to connect to PostgreSQL.").optional(),
  ),
  HARVEST_INPUT_FILE: z.preprocess(normalizeOptionalEnv, z.string().optional()),
  FAILURE_LOG_FILE: z.preprocess(normalizeOptionalEnv, z.string().optional()),
  HARVEST_CONCURRENCY: optionalInteger("HARVEST_CONCURRENCY", {
    min: 1,
    max: 64,
  }),
  HARVEST_CONCURRENCY_PER_CREDENTIAL: optionalInteger(
    "HARVEST_CONCURRENCY_PER_CREDENTIAL",
    { min: 1, max: 8 },
  ),
  HARVEST_MAX_ATTEMPTS: optionalInteger("HARVEST_MAX_ATTEMPTS", {
    min: 1,
    max: 20,
  }),
  HARVEST_BASE_DELAY_MS: optionalInteger("HARVEST_BASE_DELAY_MS", { min: 0 }),
  HARVEST_MAX_BLOCKED_WAIT_MS: optionalInteger("HARVEST_MAX_BLOCKED_WAIT_MS", {
    min: 0,
  }),
  HARVEST_REQUEST_TIMEOUT_MS: optionalInteger("HARVEST_REQUEST_TIMEOUT_MS", {
    min: 1,
  }),
  HARVEST_RATE_LIMIT_DELAY_MS: optionalInteger("HARVEST_RATE_LIMIT_DELAY_MS", {
    min: 0,
  }),
  HARVEST_BATCH_SIZE: optionalInteger("HARVEST_BATCH_SIZE", {
    min: 1,
    max: MAX_PROJECT_ROWS_PER_STATEMENT,
  }),
  HARVEST_BATCH_MAX_AGE_MS: optionalInteger("HARVEST_BATCH_MAX_AGE_MS", {
    min: 0,
  }),
  HARVEST_FLUSH_ATTEMPTS: optionalInteger("HARVEST_FLUSH_ATTEMPTS", {
    min: 1,
    max: 10,
  }),
});

const parsed = envSchema.parse({
  GITHUB_TOKENS: process.env.GITHUB_TOKENS,
  GITHUB_APP_INSTALLATION_TOKENS: process.env.GITHUB_APP_INSTALLATION_TOKENS,
  GITHUB_TOKEN: process.env.GITHUB_TOKEN,
  GITHUB_GRAPHQL_URL: process.env.GITHUB_GRAPHQL_URL,
  DATABASE_URL: process.env.DATABASE_URL,
  HARVEST_INPUT_FILE: process.env.HARVEST_INPUT_FILE,
  FAILURE_LOG_FILE: process.env.FAILURE_LOG_FILE,
  HARVEST_CONCURRENCY: process.env.HARVEST_CONCURRENCY,
  HARVEST_CONCURRENCY_PER_CREDENTIAL:
    process.env.HARVEST_CONCURRENCY_PER_CREDENTIAL,
  HARVEST_MAX_ATTEMPTS: process.env.HARVEST_MAX_ATTEMPTS,
  HARVEST_BASE_DELAY_MS: process.env.HARVEST_BASE_DELAY_MS,
  HARVEST_MAX_BLOCKED_WAIT_MS: process.env.HARVEST_MAX_BLOCKED_WAIT_MS,
  HARVEST_REQUEST_TIMEOUT_MS: process.env.HARVEST_REQUEST_TIMEOUT_MS,
  HARVEST_RATE_LIMIT_DELAY_MS: process.env.HARVEST_RATE_LIMIT_DELAY_MS,
  HARVEST_BATCH_SIZE: process.env.HARVEST_BATCH_SIZE,
  HARVEST_BATCH_MAX_AGE_MS: process.env.HARVEST_BATCH_MAX_AGE_MS,
  HARVEST_FLUSH_ATTEMPTS: process.env.HARVEST_FLUSH_ATTEMPTS,
});

function resolveFromCwd(value: string) {
  return path.isAbsolute(value) ? value : path.resolve(process.cwd(), value);
}

const tokenSources = [
  parsed.GITHUB_TOKENS,
  parsed.GITHUB_APP_INSTALLATION_TOKENS,
  parsed.GITHUB_TOKEN,
];
const resolvedTokens =
  tokenSources
    .map((source) => splitTokenList(source))
    .find((tokens) => tokens.length > 0) ?? [];

export const env = {
  GITHUB_TOKENS: Array.from(new Set(resolvedTokens)),
  GITHUB_GRAPHQL_URL:
    parsed.GITHUB_GRAPHQL_URL ?? "https://api.github.com/graphql",
  DATABASE_URL: parsed.DATABASE_URL,
  HARVEST_INPUT_FILE: resolveFromCwd(parsed.HARVEST_INPUT_FILE ?? "repos.csv"),
  FAILURE_LOG_FILE: resolveFromCwd(
    parsed.FAILURE_LOG_FILE ?? "pipeline_failures.log",
  ),
  HARVEST_CONCURRENCY: parsed.HARVEST_CONCURRENCY ?? 4,
  HARVEST_CONCURRENCY_PER_CREDENTIAL:
    parsed.HARVEST_CONCURRENCY_PER_CREDENTIAL ?? 2,
  HARVEST_MAX_ATTEMPTS: parsed.HARVEST_MAX_ATTEMPTS ?? 5,
  HARVEST_BASE_DELAY_MS: parsed.HARVEST_BASE_DELAY_MS ?? 1_000,
  HARVEST_MAX_BLOCKED_WAIT_MS: parsed.HARVEST_MAX_BLOCKED_WAIT_MS ?? 3_600_000,
  HARVEST_REQUEST_TIMEOUT_MS: parsed.HARVEST_REQUEST_TIMEOUT_MS ?? 30_000,
  HARVEST_RATE_LIMIT_DELAY_MS: parsed.HARVEST_RATE_LIMIT_DELAY_MS ?? 60_000,
  HARVEST_BATCH_SIZE: parsed.HARVEST_BATCH_SIZE ?? 100,
  HARVEST_BATCH_MAX_AGE_MS: parsed.HARVEST_BATCH_MAX_AGE_MS ?? 30_000,
  HARVEST_FLUSH_ATTEMPTS: parsed.HARVEST_FLUSH_ATTEMPTS ?? 3,
};
