import { promises as fs } from "fs";
import type * as pg from "pg";
import { ConfigurationError } from "../core/errors.js";

export const DEFAULT_SCHEMA_PATH = "db/schema.sql";

/** Creates the documents and workflow_steps tables; the statements are idempotent. */
export async function applySchema(pool: pg.Pool, filePath: string = DEFAULT_SCHEMA_PATH): Promise<void> {
  let sql: string;
  try {
    sql = await fs.readFile(filePath, "utf8");
  } catch (e) {
    throw new ConfigurationError(`cannot read schema at ${filePath}: ${String(e)}`, { filePath });
  }
  if (!sql.trim()) return;
  await pool.query(sql);
}
