// src/lib/db/client.ts
// Purpose: node-postgres pool + drizzle handle for the configured database.

import { Pool } from "pg";
import { drizzle } from "drizzle-orm/node-postgres";

import { log, errorMeta } from "@/lib/observability/logger";

export function createDatabase(connectionString: string) {
  const pool = new Pool({ connectionString });

  pool.on("error", (err) => {
    log("ERROR", "PG_POOL_ERROR", errorMeta(err));
  });

  return { pool, db: drizzle(pool) };
}
