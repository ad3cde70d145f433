import type { Kysely } from "kysely";
import type { JsonObject } from "../core/json.js";
import type { DB } from "../db/types.js";

export type DocumentBody = JsonObject & { id: string };

/** Partitioned JSON document containers (brands, post plans, posts, run state). */
export interface DocumentStore {
  upsert(container: string, partitionKey: string, doc: DocumentBody): Promise<void>;
  readItem(container: string, id: string, partitionKey: string): Promise<JsonObject | null>;
  /** Cross-partition lookup matching either the document id or its `runTraceId`. */
  queryById(container: string, id: string): Promise<JsonObject[]>;
}

function runTraceIdOf(doc: DocumentBody): string | null {
  return typeof doc.runTraceId === "string" ? doc.runTraceId : null;
}

/** Upserts are last-writer-wins per `(container, partition_key, id)`. */
export class PostgresDocumentStore implements DocumentStore {
  constructor(private readonly db: Kysely<DB>) {}

  async upsert(container: string, partitionKey: string, doc: DocumentBody): Promise<void> {
    const now = new Date().toISOString();
    const runTraceId = runTraceIdOf(doc);

    await this.db
      .insertInto("documents")
      .values({
        container,
        partition_key: partitionKey,
        id: doc.id,
        run_trace_id: runTraceId,
        body: doc,
        updated_at: now
      })
      .onConflict((oc) =>
        oc.columns(["container", "partition_key", "id"]).doUpdateSet({ body: doc, run_trace_id: runTraceId, updated_at: now })
      )
      .execute();
  }

  async readItem(container: string, id: string, partitionKey: string): Promise<JsonObject | null> {
    const row = await this.db
      .selectFrom("documents")
      .select("body")
      .where("container", "=", container)
      .where("partition_key", "=", partitionKey)
      .where("id", "=", id)
      .executeTakeFirst();
    return row ? row.body : null;
  }

  async queryById(container: string, id: string): Promise<JsonObject[]> {
    const rows = await this.db
      .selectFrom("documents")
      .select("body")
      .where("container", "=", container)
      .where((eb) => eb.or([eb("id", "=", id), eb("run_trace_id", "=", id)]))
      .orderBy("updated_at", "desc")
      .execute();
    return rows.map((r) => r.body);
  }
}
