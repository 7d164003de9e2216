import { query, withTransaction } from "@/lib/db/client";
import {
  MAX_PROJECT_ROWS_PER_STATEMENT,
  MAX_TOPIC_ROWS_PER_STATEMENT,
  PROJECT_COLUMNS,
  TOPIC_COLUMNS,
} from "@/lib/db/limits";
import type { ProjectRecord } from "@/lib/harvest/types";

export type TopicRow = {
  projectId: string;
  topic: string;
};

type Statement = {
  text: string;
  params: unknown[];
};

function toRow(record: ProjectRecord): unknown[] {
  return [
    record.id,
    record.name,
    record.ownerLogin,
    record.description,
    record.stargazerCount,
    record.forkCount,
    record.primaryLanguage,
    record.createdAt,
    record.pushedAt,
    record.licenseName,
    record.isArchived,
    record.isDisabled,
    record.isFork,
    record.url,
    record.lastExtractedAt,
  ];
}

function chunk<T>(values: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let start = 0; start < values.length; start += size) {
    chunks.push(values.slice(start, start + size));
  }
  return chunks;
}

function buildValues(rows: readonly unknown[][], params: unknown[]) {
  return rows
    .map((row) => {
      const placeholders = row.map((value) => {
        params.push(value);
        return `$${params.length}`;
      });
      return `(${placeholders.join(", ")})`;
    })
    .join(", ");
}

export function buildProjectUpsert(records: readonly ProjectRecord[]): Statement {
  const params: unknown[] = [];
  const values = buildValues(records.map(toRow), params);

  const updates = PROJECT_COLUMNS.filter((column) => column !== "id").map(
    (column) => `${column} = EXCLUDED.${column}`,
  );

  const text = `INSERT INTO projects (${PROJECT_COLUMNS.join(", ")})
     VALUES ${values}
     ON CONFLICT (id) DO UPDATE SET
       ${updates.join(",\n       ")}`;

  return { text, params };
}

export function buildTopicInsert(rows: readonly TopicRow[]): Statement {
  const params: unknown[] = [];
  const values = buildValues(
    rows.map((row) => [row.projectId, row.topic]),
    params,
  );

  const text = `INSERT INTO project_topics (${TOPIC_COLUMNS.join(", ")})
     VALUES ${values}
     ON CONFLICT (project_id, topic) DO NOTHING`;

  return { text, params };
}

/**
 * Replaces the topic rows of the given projects. Topics dropped on GitHub
 * disappear; the rest are re-inserted.
 */
export function buildTopicStatements(
  records: readonly ProjectRecord[],
): Statement[] {
  const statements: Statement[] = [
    {
      text: "DELETE FROM project_topics WHERE project_id = ANY($1::varchar[])",
      params: [records.map((record) => record.id)],
    },
  ];

  const rows = records.flatMap((record) =>
    record.topics.map((topic) => ({ projectId: record.id, topic })),
  );
  for (const rowsChunk of chunk(rows, MAX_TOPIC_ROWS_PER_STATEMENT)) {
    statements.push(buildTopicInsert(rowsChunk));
  }

  return statements;
}

/**
 * Upserts one batch, with its topics, in a single transaction so the batch
 * lands atomically. Callers pass records with distinct ids: PostgreSQL refuses
 * to update the same row twice within one `ON CONFLICT` statement.
 */
export async function upsertProjects(records: readonly ProjectRecord[]) {
  if (!records.length) {
    return 0;
  }

  return withTransaction(async (client) => {
    let upserted = 0;
    for (const recordsChunk of chunk(records, MAX_PROJECT_ROWS_PER_STATEMENT)) {
      const { text, params } = buildProjectUpsert(recordsChunk);
      const result = await client.query(text, params);
      upserted += result.rowCount ?? recordsChunk.length;
    }

    for (const { text, params } of buildTopicStatements(records)) {
      await client.query(text, params);
    }

    return upserted;
  });
}

export async function countProjects() {
  const result = await query<{ count: string }>(
    `SELECT COUNT(*)::text AS count FROM projects`,
  );
  return Number(result.rows[0]?.count ?? 0);
}
