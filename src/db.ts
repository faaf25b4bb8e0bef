// src/db.ts
import { Pool, type QueryResult, type QueryResultRow } from "pg";
import { config } from "./config";

/**
 * PostgreSQL connection pool, created on first use.
 * - Prefer DATABASE_URL
 * - Fallback to discrete PG* env vars if needed
 */
let pool: Pool | undefined;

function createPool(): Pool {
  if (config.databaseUrl) {
    return new Pool({ connectionString: config.databaseUrl });
  }
  const sslMode = String(process.env.PGSSLMODE || "").toLowerCase();
  return new Pool({
    host: process.env.PGHOST,
    port: Number(process.env.PGPORT || 5432),
    user: process.env.PGUSER,
    password: process.env.PGPASSWORD,
    database: process.env.PGDATABASE,
    ssl: sslMode && sslMode !== "disable" ? { rejectUnauthorized: sslMode !== "no-verify" } : undefined,
  });
}

export function getPool(): Pool {
  pool ??= createPool();
  return pool;
}

/**
 * Typed query helper.
 * Example:
 *   const { rows } = await query<{ id: number }>("select id from people");
 */
export function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return getPool().query<T>(text, params);
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const p = pool;
  pool = undefined;
  await p.end();
}
