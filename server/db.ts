import { Pool, neonConfig } from '@neondatabase/serverless';
import { drizzle, type NeonDatabase } from 'drizzle-orm/neon-serverless';
import ws from "ws";
import * as schema from "@shared/schema";
import { getEnv } from "./config/env";
import { log } from "./utils/logger";

neonConfig.webSocketConstructor = ws;

export type Database = NeonDatabase<typeof schema>;

let pool: Pool | undefined;
let database: Database | undefined;

/**
 * Lazily opens the pool so modules that only need the storage interface can
 * be loaded without DATABASE_URL (tests, token script).
 */
export function getDb(): Database {
  if (database) {
    return database;
  }

  const { DATABASE_URL } = getEnv();
  if (!DATABASE_URL) {
    throw new Error(
      "DATABASE_URL must be set. Did you forget to provision a database?",
    );
  }

  pool = new Pool({
    connectionString: DATABASE_URL,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err: Error) => {
    log.error({ component: 'Database', err }, 'Idle client error');
  });

  database = drizzle({ client: pool, schema });
  return database;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = undefined;
    database = undefined;
  }
}
