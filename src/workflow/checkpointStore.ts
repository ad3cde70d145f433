import { randomBytes } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import type { Kysely } from "kysely";
import * as z from "zod/v4";
import { isJsonObject } from "../core/json.js";
import type { DB } from "../db/types.js";
import { KeyedMutex } from "../store/keyedMutex.js";

export type StepRecord = { status: "completed"; output: unknown } | { status: "failed"; error: string };

/** Activity results per workflow instance, keyed by step name. */
export interface WorkflowCheckpointStore {
  load(instanceId: string): Promise<Map<string, StepRecord>>;
  save(instanceId: string, name: string, record: StepRecord): Promise<void>;
}

export class PostgresCheckpointStore implements WorkflowCheckpointStore {
  constructor(private readonly db: Kysely<DB>) {}

  async load(instanceId: string): Promise<Map<string, StepRecord>> {
    const rows = await this.db
      .selectFrom("workflow_steps")
      .select(["name", "status", "output", "error"])
      .where("instance_id", "=", instanceId)
      .execute();

    const out = new Map<string, StepRecord>();
    for (const row of rows) {
      if (row.status === "completed") {
        out.set(row.name, { status: "completed", output: row.output?.value });
      } else {
        out.set(row.name, { status: "failed", error: row.error ?? "unknown error" });
      }
    }
    return out;
  }

  async save(instanceId: string, name: string, record: StepRecord): Promise<void> {
    const values =
      record.status === "completed"
        ? { status: record.status, output: { value: record.output }, error: null }
        : { status: record.status, output: null, error: record.error };

    const completedAt = new Date().toISOString();
    await this.db
      .insertInto("workflow_steps")
      .values({ instance_id: instanceId, name, ...values, completed_at: completedAt })
      .onConflict((oc) => oc.columns(["instance_id", "name"]).doUpdateSet({ ...values, completed_at: completedAt }))
      .execute();
  }
}

const zStepRecord = z.union([
  z.object({ status: z.literal("completed"), output: z.unknown() }),
  z.object({ status: z.literal("failed"), error: z.string() })
]);

/** One JSON file per instance, replaced atomically on every save. */
export class FileCheckpointStore implements WorkflowCheckpointStore {
  private readonly mutex = new KeyedMutex();

  constructor(private readonly dir: string) {}

  private filePath(instanceId: string): string {
    return path.join(this.dir, `${instanceId.replace(/[^A-Za-z0-9_-]/g, "_")}.json`);
  }

  async load(instanceId: string): Promise<Map<string, StepRecord>> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath(instanceId), "utf8");
    } catch (e) {
      if (isJsonObject(e) && e.code === "ENOENT") return new Map();
      throw e;
    }
    const parsed: unknown = JSON.parse(text);
    const out = new Map<string, StepRecord>();
    if (!isJsonObject(parsed)) return out;
    for (const [name, raw] of Object.entries(parsed)) {
      const rec = zStepRecord.safeParse(raw);
      if (rec.success) out.set(name, rec.data);
    }
    return out;
  }

  save(instanceId: string, name: string, record: StepRecord): Promise<void> {
    // Fan-out branches save concurrently into the same file.
    return this.mutex.runExclusive(instanceId, async () => {
      const current = await this.load(instanceId);
      current.set(name, record);
      await fs.mkdir(this.dir, { recursive: true });
      const target = this.filePath(instanceId);
      const tmp = `${target}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
      await fs.writeFile(tmp, JSON.stringify(Object.fromEntries(current)), "utf8");
      await fs.rename(tmp, target);
    });
  }
}
