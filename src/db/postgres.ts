import { Pool } from "pg";
import type { SwitchboardEnv } from "../config/env";

export type Queryable = {
  query: (text: string, values: unknown[]) => Promise<{ rows: unknown[] }>;
};

let pool: Pool | null = null;

export function getPgPool(env: SwitchboardEnv): Pool {
  if (pool) return pool;
  pool = new Pool({
    host: env.PGHOST,
    port: env.PGPORT,
    database: env.PGDATABASE,
    user: env.PGUSER,
    password: env.PGPASSWORD,
    ssl: env.PGSSLMODE === "require" ? { rejectUnauthorized: false } : false,
    max: env.SWITCHBOARD_PG_POOL_MAX,
    idleTimeoutMillis: env.SWITCHBOARD_PG_IDLE_TIMEOUT_MS,
    connectionTimeoutMillis: env.SWITCHBOARD_PG_CONNECTION_TIMEOUT_MS,
  });
  return pool;
}

export async function closePgPool(): Promise<void> {
  if (!pool) return;
  await pool.end();
  pool = null;
}
