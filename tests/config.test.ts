import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";

import { loadConfig, parseConfig } from "../src/config/config.js";
import { ConfigurationError } from "../src/core/errors.js";

describe("parseConfig", () => {
  it("fills every default when no file is given", () => {
    const config = parseConfig(null, {});
    expect(config.driver).toBe("chained");
    expect(config.runState).toEqual({
      backend: "auto",
      fileDir: path.join(os.tmpdir(), "content-relay-runtime"),
      container: "agent_runs",
      partitionKeyPath: "/runTraceId"
    });
    expect(config.documents).toEqual({ databaseUrl: null, autoSchema: true });
    expect(config.queues).toEqual({
      content: "content-tasks",
      media: "media-tasks",
      publish: "publish-tasks",
      redisUrl: null,
      maxDeliveries: 5
    });
    expect(config.retry).toEqual({ attempts: 3, initialDelayMs: 1500, multiplier: 1.5 });
    expect(config.agents).toEqual({ endpoint: null, apiKey: null, model: null, pollIntervalMs: 750 });
    expect(config.media).toEqual({
      storeDir: path.join(os.tmpdir(), "content-relay-media"),
      searchEndpoint: null,
      searchApiKey: null,
      searchSafeSearch: "Moderate",
      searchLicense: null
    });
  });

  it("enables image search from the environment", () => {
    const config = parseConfig(
      { version: 1, media: { search_safe_search: "Strict" } },
      { IMAGE_SEARCH_ENDPOINT: "https://images.example/search", IMAGE_SEARCH_API_KEY: "test-secret" }
    );
    expect(config.media.searchEndpoint).toBe("https://images.example/search");
    expect(config.media.searchApiKey).toBe("test-secret");
    expect(config.media.searchSafeSearch).toBe("Strict");
  });

  it("expands ${VAR} and $VAR references and drops unset ones", () => {
    const config = parseConfig(
      {
        version: 1,
        run_state: { file_dir: "${STATE_HOME}" },
        queues: { redis_url: "$QUEUE_URL" },
        agents: { endpoint: "${UNSET_ENDPOINT}" }
      },
      { STATE_HOME: "/data/state", QUEUE_URL: "redis://localhost:6379" }
    );
    expect(config.runState.fileDir).toBe("/data/state");
    expect(config.queues.redisUrl).toBe("redis://localhost:6379");
    expect(config.agents.endpoint).toBeNull();
  });

  it("lets the environment override file values", () => {
    const config = parseConfig(
      { version: 1, driver: "chained", run_state: { backend: "file" } },
      {
        PIPELINE_DRIVER: "workflow",
        RUN_STATE_BACKEND: "REMOTE",
        RUN_STATE_PARTITION_KEY_PATH: "/brandId",
        DATABASE_URL: "postgres://localhost/relay",
        AUTO_SCHEMA: "false",
        CONTENT_TASKS_QUEUE: "content-v2",
        AGENT_API_KEY: "test-secret"
      }
    );
    expect(config.driver).toBe("workflow");
    expect(config.runState.backend).toBe("remote");
    expect(config.runState.partitionKeyPath).toBe("/brandId");
    expect(config.documents).toEqual({ databaseUrl: "postgres://localhost/relay", autoSchema: false });
    expect(config.queues.content).toBe("content-v2");
    expect(config.agents.apiKey).toBe("test-secret");
  });

  it("rejects an unknown choice in the environment", () => {
    expect(() => parseConfig(null, { PIPELINE_DRIVER: "cron" })).toThrow(
      'PIPELINE_DRIVER must be one of chained, workflow (got "cron")'
    );
  });

  it("rejects invalid file values", () => {
    expect(() => parseConfig({ version: 1, retry: { attempts: 0 } }, {})).toThrow(ConfigurationError);
    expect(() => parseConfig({ version: 1, retry: { attempts: 0 } }, {})).toThrow(/invalid pipeline config/);
  });
});

describe("loadConfig", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "content-relay-config-"));
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("reads the shipped pipeline config", async () => {
    const config = await loadConfig(path.resolve("config/pipeline.yaml"), {});
    expect(config.driver).toBe("chained");
    expect(config.documents.databaseUrl).toBeNull();
    expect(config.queues.media).toBe("media-tasks");
    expect(config.retry.attempts).toBe(3);
  });

  it("reads a YAML file with partial sections", async () => {
    const file = path.join(tmpDir, "pipeline.yaml");
    await writeFile(file, "version: 1\ndriver: workflow\nretry:\n  attempts: 5\n", "utf8");
    const config = await loadConfig(file, {});
    expect(config.driver).toBe("workflow");
    expect(config.retry).toEqual({ attempts: 5, initialDelayMs: 1500, multiplier: 1.5 });
  });

  it("fails when an explicit path is missing", async () => {
    await expect(loadConfig(path.join(tmpDir, "missing.yaml"), {})).rejects.toThrow(/cannot read pipeline config/);
  });

  it("honours PIPELINE_CONFIG_PATH", async () => {
    const file = path.join(tmpDir, "from-env.yaml");
    await writeFile(file, "version: 1\nqueues:\n  max_deliveries: 2\n", "utf8");
    const config = await loadConfig(undefined, { PIPELINE_CONFIG_PATH: file });
    expect(config.queues.maxDeliveries).toBe(2);
  });
});
