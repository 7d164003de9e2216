// PostgreSQL rejects a statement carrying more bind parameters than this.
export const POSTGRES_MAX_PARAMETERS = 65_535;

export const PROJECT_COLUMNS = [
  "id",
  "name",
  "owner_login",
  "description",
  "stargazer_count",
  "fork_count",
  "primary_language",
  "created_at",
  "pushed_at",
  "license_name",
  "is_archived",
  "is_disabled",
  "is_fork",
  "url",
  "last_extracted_at",
] as const;

export const TOPIC_COLUMNS = ["project_id", "topic"] as const;

export const MAX_PROJECT_ROWS_PER_STATEMENT = Math.floor(
  POSTGRES_MAX_PARAMETERS / PROJECT_COLUMNS.length,
);

export const MAX_TOPIC_ROWS_PER_STATEMENT = Math.floor(
  POSTGRES_MAX_PARAMETERS / TOPIC_COLUMNS.length,
);
