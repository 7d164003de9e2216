export { closePool, query, withClient } from "./client";
export { describeDatabaseError, isTransientDatabaseError } from "./errors";
export { countProjects, upsertProjects } from "./operations";
export { PostgresProjectStore } from "./project-store";
export { ensureSchema } from "./schema";
