import { upsertProjects } from "@/lib/db/operations";
import { ensureSchema } from "@/lib/db/schema";
import type { ProjectRecord, ProjectStore } from "@/lib/harvest/types";

export class PostgresProjectStore implements ProjectStore<ProjectRecord> {
  async ensureSchema() {
    await ensureSchema();
  }

  async upsertBatch(records: ProjectRecord[]) {
    await upsertProjects(records);
  }
}
