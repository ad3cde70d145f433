import type { ColumnType, Generated, JSONColumnType } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type JsonObject = Record<string, unknown>;
type Json = JSONColumnType<JsonObject, JsonObject, JsonObject>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;

export interface DocumentsTable {
  container: string;
  partition_key: string;
  id: string;
  run_trace_id: OptionalNullable<string>;
  body: Json;
  updated_at: Generated<string>;
}

export interface WorkflowStepsTable {
  instance_id: string;
  name: string;
  status: string;
  output: JsonNullable;
  error: OptionalNullable<string>;
  completed_at: Generated<string>;
}

export interface DB {
  documents: DocumentsTable;
  workflow_steps: WorkflowStepsTable;
}
