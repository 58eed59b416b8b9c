import { Pool } from "pg";
import { drizzle } from "drizzle-orm/node-postgres";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import * as schema from "../../drizzle/schema";

let pool: Pool | null = null;
let db: NodePgDatabase<typeof schema> | null = null;

/** Opens the shared pool on first use; null when no connection string is configured. */
export function maybeGetDb(connectionString: string | null): NodePgDatabase<typeof schema> | null {
  if (db) {
    return db;
  }
  if (!connectionString) {
    return null;
  }
  pool = new Pool({ connectionString });
  db = drizzle(pool, { schema });
  return db;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
  db = null;
}

export type Database = NodePgDatabase<typeof schema>;
export * as schema from "../../drizzle/schema";
