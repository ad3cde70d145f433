import * as pg from "pg";
import { Kysely, PostgresDialect } from "kysely";
import { newDb } from "pg-mem";
import type { DB } from "./types.js";

/** Pool for `databaseUrl`; without one the documents live in an in-process pg-mem database. */
export function createPool(databaseUrl: string | null): pg.Pool {
  if (databaseUrl) return new pg.Pool({ connectionString: databaseUrl });

  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  return new adapter.Pool() as unknown as pg.Pool;
}

export function createDb(pool: pg.Pool): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool })
  });
}
