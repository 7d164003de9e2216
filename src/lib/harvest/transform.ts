import type { RepositoryNode } from "@/lib/github/repository-payload";
import type { ProjectRecord, TransformResult } from "@/lib/harvest/types";

function optionalText(value: string | null | undefined) {
  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function parseTimestamp(
  value: string | null | undefined,
  field: string,
): { ok: true; value: Date | null } | { ok: false; reason: string } {
  if (value == null || value === "") {
    return { ok: true, value: null };
  }

  const timestamp = Date.parse(value);
  if (Number.isNaN(timestamp)) {
    return { ok: false, reason: `Unparseable ${field} timestamp "${value}".` };
  }

  return { ok: true, value: new Date(timestamp) };
}

function collectTopics(repository: RepositoryNode) {
  const topics = new Set<string>();
  for (const node of repository.repositoryTopics?.nodes ?? []) {
    const topic = optionalText(node?.topic?.name);
    if (topic) {
      topics.add(topic);
    }
  }

  return Array.from(topics);
}

/**
 * Flattens one `repository` node into a `projects` row. Pure: the extraction
 * time is passed in rather than read from the clock.
 */
export function transformRepository(
  repository: RepositoryNode,
  extractedAt: Date,
): TransformResult<ProjectRecord> {
  const id = optionalText(repository.id);
  const name = optionalText(repository.name);
  const ownerLogin = optionalText(repository.owner?.login);

  const missing = [
    id ? null : "id",
    name ? null : "name",
    ownerLogin ? null : "owner.login",
  ].filter((field): field is string => field !== null);
  if (!id || !name || !ownerLogin) {
    const location = optionalText(repository.url) ?? "unknown repository";
    return {
      ok: false,
      reason: `Essential project data missing (${missing.join(", ")}) for ${location}.`,
    };
  }

  const createdAt = parseTimestamp(repository.createdAt, "createdAt");
  if (!createdAt.ok) {
    return createdAt;
  }

  const pushedAt = parseTimestamp(repository.pushedAt, "pushedAt");
  if (!pushedAt.ok) {
    return pushedAt;
  }

  return {
    ok: true,
    record: {
      id,
      name,
      ownerLogin,
      description: repository.description ?? null,
      stargazerCount: repository.stargazerCount ?? null,
      forkCount: repository.forkCount ?? null,
      primaryLanguage: optionalText(repository.primaryLanguage?.name),
      createdAt: createdAt.value,
      pushedAt: pushedAt.value,
      licenseName: optionalText(repository.licenseInfo?.name),
      isArchived: repository.isArchived ?? null,
      isDisabled: repository.isDisabled ?? null,
      isFork: repository.isFork ?? null,
      url: optionalText(repository.url),
      lastExtractedAt: extractedAt,
      topics: collectTopics(repository),
    },
  };
}
