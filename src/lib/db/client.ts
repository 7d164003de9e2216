import {
  Pool,
  type PoolClient,
  type PoolConfig,
  type QueryResult,
  type QueryResultRow,
} from "pg";

import { getSqlState } from "@/lib/db/errors";
import { env } from "@/lib/env";

type QueryParams = Array<unknown> | undefined;

let pool: Pool | null = null;

function createPool() {
  if (!env.DATABASE_URL) {
    throw new Error(
      "DATABASE_URL is not configured. Update your environment settings.",
    );
  }

  const config: PoolConfig = {
    connectionString: env.DATABASE_URL,
    max: Math.max(2, env.HARVEST_CONCURRENCY),
    idleTimeoutMillis: 30_000,
  };

  const client = new Pool(config);

  client.on("error", (error) => {
    // admin_shutdown: the server went away between runs.
    if (getSqlState(error) === "57P01") {
      return;
    }

    console.error("Unexpected database client error", error);
  });

  return client;
}

export function getPool() {
  if (!pool) {
    pool = createPool();
  }

  return pool;
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: QueryParams,
): Promise<QueryResult<T>> {
  return getPool().query<T>(text, params);
}

export async function withClient<T>(
  handler: (client: PoolClient) => Promise<T>,
) {
  const client = await getPool().connect();
  try {
    return await handler(client);
  } finally {
    client.release();
  }
}

export async function withTransaction<T>(
  handler: (client: PoolClient) => Promise<T>,
) {
  return withClient(async (client) => {
    await client.query("BEGIN");
    try {
      const result = await handler(client);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    }
  });
}

export async function closePool() {
  if (!pool) {
    return;
  }

  await pool.end();
  pool = null;
}
