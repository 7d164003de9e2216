import type { ProjectRecord, ProjectStore } from "@/lib/harvest/types";

export function buildProjectRecord(
  overrides: Partial<ProjectRecord> = {},
): ProjectRecord {
  return {
    id: "R_kgDOTest",
    name: "widgets",
    ownerLogin: "octo",
    description: null,
    stargazerCount: 1,
    forkCount: 0,
    primaryLanguage: "TypeScript",
    createdAt: new Date("2020-01-01T00:00:00.000Z"),
    pushedAt: null,
    licenseName: null,
    isArchived: false,
    isDisabled: false,
    isFork: false,
    url: "https://github.com/octo/widgets",
    lastExtractedAt: new Date("2024-05-01T00:00:00.000Z"),
    topics: [],
    ...overrides,
  };
}

/**
 * Keeps `projects` rows in a Map keyed by id and mirrors PostgreSQL's refusal
 * to touch the same row twice in one upsert.
 */
export class InMemoryProjectStore implements ProjectStore<ProjectRecord> {
  readonly rows = new Map<string, ProjectRecord>();
  readonly batches: ProjectRecord[][] = [];
  schemaCalls = 0;
  upsertCalls = 0;
  private readonly pendingFailures: unknown[] = [];

  failNext(...errors: unknown[]) {
    this.pendingFailures.push(...errors);
  }

  async ensureSchema() {
    this.schemaCalls += 1;
  }

  async upsertBatch(records: ProjectRecord[]) {
    this.upsertCalls += 1;
    if (this.pendingFailures.length) {
      throw this.pendingFailures.shift();
    }

    const ids = new Set<string>();
    for (const record of records) {
      if (ids.has(record.id)) {
        throw Object.assign(
          new Error(
            "ON CONFLICT DO UPDATE command cannot affect row a second time",
          ),
          { code: "21000" },
        );
      }
      ids.add(record.id);
    }

    this.batches.push([...records]);
    for (const record of records) {
      this.rows.set(record.id, { ...record });
    }
  }
}
