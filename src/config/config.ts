import { promises as fs } from "fs";
import os from "os";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { ConfigurationError } from "../core/errors.js";

export const RUN_STATE_BACKENDS = ["auto", "file", "remote"] as const;
export type RunStateBackendSetting = (typeof RUN_STATE_BACKENDS)[number];

export const PARTITION_KEY_PATHS = ["/runTraceId", "/partitionKey", "/id", "/brandId", "/postPlanId"] as const;
export type PartitionKeyPath = (typeof PARTITION_KEY_PATHS)[number];

export const DRIVERS = ["chained", "workflow"] as const;
export type DriverKind = (typeof DRIVERS)[number];

const zFileConfig = z.object({
  version: z.number().int(),
  driver: z.enum(DRIVERS).default("chained"),
  run_state: z
    .object({
      backend: z.enum(RUN_STATE_BACKENDS).default("auto"),
      file_dir: z.string().min(1).optional(),
      container: z.string().min(1).default("agent_runs"),
      partition_key_path: z.enum(PARTITION_KEY_PATHS).default("/runTraceId")
    })
    .default({ backend: "auto", container: "agent_runs", partition_key_path: "/runTraceId" }),
  documents: z
    .object({
      database_url: z.string().min(1).optional(),
      auto_schema: z.boolean().default(true)
    })
    .default({ auto_schema: true }),
  queues: z
    .object({
      content: z.string().min(1).default("content-tasks"),
      media: z.string().min(1).default("media-tasks"),
      publish: z.string().min(1).default("publish-tasks"),
      redis_url: z.string().min(1).optional(),
      max_deliveries: z.number().int().min(1).default(5)
    })
    .default({ content: "content-tasks", media: "media-tasks", publish: "publish-tasks", max_deliveries: 5 }),
  retry: z
    .object({
      attempts: z.number().int().min(1).max(10).default(3),
      initial_delay_ms: z.number().int().min(0).default(1500),
      multiplier: z.number().min(1).default(1.5)
    })
    .default({ attempts: 3, initial_delay_ms: 1500, multiplier: 1.5 }),
  agents: z
    .object({
      endpoint: z.string().url().optional(),
      api_key: z.string().min(1).optional(),
      model: z.string().min(1).optional(),
      poll_interval_ms: z.number().int().min(10).default(750)
    })
    .default({ poll_interval_ms: 750 }),
  media: z
    .object({
      store_dir: z.string().min(1).optional(),
      search_endpoint: z.string().url().optional(),
      search_api_key: z.string().min(1).optional(),
      search_safe_search: z.enum(["Off", "Moderate", "Strict"]).default("Moderate"),
      search_license: z.string().min(1).optional()
    })
    .default({ search_safe_search: "Moderate" })
});

type FileConfig = z.infer<typeof zFileConfig>;

export interface RetrySettings {
  attempts: number;
  initialDelayMs: number;
  multiplier: number;
}

export interface PipelineConfig {
  driver: DriverKind;
  runState: {
    backend: RunStateBackendSetting;
    fileDir: string;
    container: string;
    partitionKeyPath: PartitionKeyPath;
  };
  documents: {
    databaseUrl: string | null;
    autoSchema: boolean;
  };
  queues: {
    content: string;
    media: string;
    publish: string;
    redisUrl: string | null;
    maxDeliveries: number;
  };
  retry: RetrySettings;
  agents: {
    endpoint: string | null;
    apiKey: string | null;
    model: string | null;
    pollIntervalMs: number;
  };
  media: {
    storeDir: string;
    /** Image search is offered to the image agent only when an endpoint is set. */
    searchEndpoint: string | null;
    searchApiKey: string | null;
    searchSafeSearch: "Off" | "Moderate" | "Strict";
    searchLicense: string | null;
  };
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG_PATH = "config/pipeline.yaml";

function expandEnvToken(value: string, env: Env): string | undefined {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;
  const varName = m[1];
  if (!varName) return undefined;
  const v = env[varName]?.trim();
  return v ? v : undefined;
}

function expandTree(value: unknown, env: Env): unknown {
  if (typeof value === "string") return expandEnvToken(value, env);
  if (Array.isArray(value)) return value.map((v) => expandTree(v, env));
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      const expanded = expandTree(v, env);
      if (expanded !== undefined) out[k] = expanded;
    }
    return out;
  }
  return value;
}

function envChoice<T extends string>(env: Env, name: string, allowed: readonly T[]): T | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const match = allowed.find((a) => a.toLowerCase() === raw.toLowerCase());
  if (!match) {
    throw new ConfigurationError(`${name} must be one of ${allowed.join(", ")} (got "${raw}")`, { name, value: raw });
  }
  return match;
}

function envString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function fromFileConfig(file: FileConfig, env: Env): PipelineConfig {
  const autoSchemaEnv = envString(env, "AUTO_SCHEMA");
  return {
    driver: envChoice(env, "PIPELINE_DRIVER", DRIVERS) ?? file.driver,
    runState: {
      backend: envChoice(env, "RUN_STATE_BACKEND", RUN_STATE_BACKENDS) ?? file.run_state.backend,
      fileDir:
        envString(env, "RUNTIME_STATE_DIR") ??
        file.run_state.file_dir ??
        path.join(os.tmpdir(), "content-relay-runtime"),
      container: file.run_state.container,
      partitionKeyPath:
        envChoice(env, "RUN_STATE_PARTITION_KEY_PATH", PARTITION_KEY_PATHS) ?? file.run_state.partition_key_path
    },
    documents: {
      databaseUrl: envString(env, "DATABASE_URL") ?? file.documents.database_url ?? null,
      autoSchema: autoSchemaEnv ? autoSchemaEnv.toLowerCase() !== "false" : file.documents.auto_schema
    },
    queues: {
      content: envString(env, "CONTENT_TASKS_QUEUE") ?? file.queues.content,
      media: envString(env, "MEDIA_TASKS_QUEUE") ?? file.queues.media,
      publish: envString(env, "PUBLISH_TASKS_QUEUE") ?? file.queues.publish,
      redisUrl: envString(env, "REDIS_URL") ?? file.queues.redis_url ?? null,
      maxDeliveries: file.queues.max_deliveries
    },
    retry: {
      attempts: file.retry.attempts,
      initialDelayMs: file.retry.initial_delay_ms,
      multiplier: file.retry.multiplier
    },
    agents: {
      endpoint: envString(env, "AGENT_ENDPOINT") ?? file.agents.endpoint ?? null,
      apiKey: envString(env, "AGENT_API_KEY") ?? file.agents.api_key ?? null,
      model: envString(env, "MODEL_DEPLOYMENT_NAME") ?? file.agents.model ?? null,
      pollIntervalMs: file.agents.poll_interval_ms
    },
    media: {
      storeDir: envString(env, "MEDIA_STORE_DIR") ?? file.media.store_dir ?? path.join(os.tmpdir(), "content-relay-media"),
      searchEndpoint: envString(env, "IMAGE_SEARCH_ENDPOINT") ?? file.media.search_endpoint ?? null,
      searchApiKey: envString(env, "IMAGE_SEARCH_API_KEY") ?? file.media.search_api_key ?? null,
      searchSafeSearch: file.media.search_safe_search,
      searchLicense: envString(env, "IMAGE_SEARCH_LICENSE") ?? file.media.search_license ?? null
    }
  };
}

export function parseConfig(raw: unknown, env: Env = process.env): PipelineConfig {
  const parsed = zFileConfig.safeParse(expandTree(raw ?? { version: 1 }, env));
  if (!parsed.success) {
    throw new ConfigurationError(`invalid pipeline config: ${z.prettifyError(parsed.error)}`);
  }
  return fromFileConfig(parsed.data, env);
}

export async function loadConfig(filePath?: string, env: Env = process.env): Promise<PipelineConfig> {
  const configPath = filePath ?? envString(env, "PIPELINE_CONFIG_PATH") ?? DEFAULT_CONFIG_PATH;
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (e) {
    // Only the default path may be missing; an explicit path must exist.
    if (!filePath && !envString(env, "PIPELINE_CONFIG_PATH")) return parseConfig(null, env);
    throw new ConfigurationError(`cannot read pipeline config at ${configPath}: ${String(e)}`);
  }
  const doc: unknown = YAML.parse(raw);
  return parseConfig(doc, env);
}
