// src/lib/db/migrate.ts
// Purpose: Apply the SQL files under drizzle/ in name order. Every statement is idempotent.

import { readdir, readFile } from "fs/promises";
import path from "path";

import { log } from "@/lib/observability/logger";

export const MIGRATIONS_DIR = path.resolve(__dirname, "../../../drizzle");

/**
 * `execute` must accept several statements in one string
 * (pg `Pool.query` without parameters, PGlite `exec`).
 */
export async function migrate(
  execute: (sqlText: string) => Promise<unknown>,
  dir: string = MIGRATIONS_DIR,
): Promise<string[]> {
  const files = (await readdir(dir)).filter((f) => f.endsWith(".sql")).sort();

  for (const file of files) {
    const sqlText = await readFile(path.join(dir, file), "utf8");
    await execute(sqlText);
    log("INFO", "DB_MIGRATION_APPLIED", { file });
  }

  return files;
}
