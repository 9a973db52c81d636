// src/lib/db.ts
// Postgres pool singleton and transaction helper.

import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from "pg";
import { log } from "@/lib/observability/logger";

export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
}

let pool: Pool | null = null;

export function getPool(connectionString: string): Pool {
  if (!pool) {
    pool = new Pool({
      connectionString,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    pool.on("error", (err) => {
      log("ERROR", "PG_IDLE_CLIENT_ERROR", { error: err.message });
    });
  }

  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    const current = pool;
    pool = null;
    await current.end();
  }
}

/**
 * BEGIN / COMMIT around `fn`; ROLLBACK on any error.
 * `statementTimeoutMs` is applied with SET LOCAL so it dies with the transaction.
 */
export async function withTransaction<T>(
  db: Pool,
  fn: (client: PoolClient) => Promise<T>,
  statementTimeoutMs?: number,
): Promise<T> {
  const client = await db.connect();

  try {
    await client.query("BEGIN");

    if (statementTimeoutMs !== undefined) {
      await client.query(
        `SET LOCAL statement_timeout = ${Math.max(1, Math.floor(statementTimeoutMs))}`,
      );
    }

    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      log("WARN", "PG_ROLLBACK_FAILED", {
        error: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr),
      });
    }
    throw err;
  } finally {
    client.release();
  }
}
