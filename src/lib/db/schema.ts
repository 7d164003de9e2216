import { withClient } from "@/lib/db/client";

const SCHEMA_LOCK_ID = BigInt("7315402286640117");

export const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS projects (
    id VARCHAR(255) PRIMARY KEY,
    name VARCHAR(255) NOT NULL,
    owner_login VARCHAR(255) NOT NULL,
    description TEXT,
    stargazer_count INTEGER,
    fork_count INTEGER,
    primary_language VARCHAR(100),
    created_at TIMESTAMPTZ,
    pushed_at TIMESTAMPTZ,
    license_name VARCHAR(255),
    is_archived BOOLEAN,
    is_disabled BOOLEAN,
    is_fork BOOLEAN,
    url TEXT,
    last_extracted_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  `CREATE INDEX IF NOT EXISTS projects_owner_login_idx ON projects(owner_login)`,
  `CREATE INDEX IF NOT EXISTS projects_last_extracted_idx ON projects(last_extracted_at DESC)`,
  `CREATE TABLE IF NOT EXISTS project_topics (
    project_id VARCHAR(255) REFERENCES projects(id) ON DELETE CASCADE,
    topic VARCHAR(255) NOT NULL,
    PRIMARY KEY (project_id, topic)
  )`,
  `CREATE TABLE IF NOT EXISTS project_build_configs (
    id SERIAL PRIMARY KEY,
    project_id VARCHAR(255) REFERENCES projects(id) ON DELETE CASCADE,
    file_path VARCHAR(500) NOT NULL,
    config_type VARCHAR(100),
    parsed_content JSONB,
    raw_content TEXT,
    UNIQUE (project_id, file_path)
  )`,
  `CREATE TABLE IF NOT EXISTS project_dependencies (
    id SERIAL PRIMARY KEY,
    project_id VARCHAR(255) REFERENCES projects(id) ON DELETE CASCADE,
    package_name VARCHAR(255) NOT NULL,
    version VARCHAR(255),
    dependency_type VARCHAR(100),
    UNIQUE (project_id, package_name, dependency_type)
  )`,
];

let ensurePromise: Promise<void> | null = null;

async function applySchema() {
  // Session-level advisory locks belong to one connection, so the lock, the
  // statements and the unlock share a client.
  await withClient(async (client) => {
    await client.query("SELECT pg_advisory_lock($1)", [SCHEMA_LOCK_ID]);

    try {
      for (const statement of SCHEMA_STATEMENTS) {
        await client.query(statement);
      }
    } finally {
      await client.query("SELECT pg_advisory_unlock($1)", [SCHEMA_LOCK_ID]);
    }
  });
}

export async function ensureSchema() {
  if (!ensurePromise) {
    ensurePromise = applySchema().catch((error: unknown) => {
      ensurePromise = null;
      throw error;
    });
  }

  return ensurePromise;
}
