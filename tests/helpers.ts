import path from "path";
import type * as pg from "pg";
import type { Kysely } from "kysely";

import type { ChannelPostInput, Collaborators, PublishedPost } from "../src/collaborators/types.js";
import type { JsonObject } from "../src/core/json.js";
import type { Logger } from "../src/core/log.js";
import type { RunState } from "../src/core/run.js";
import { applySchema } from "../src/db/bootstrap.js";
import { createDb, createPool } from "../src/db/connection.js";
import type { DB } from "../src/db/types.js";
import type { RetryOptions } from "../src/execution/retry.js";
import { BaseRunStateStore } from "../src/state/runStateStore.js";
import type { DocumentBody, DocumentStore } from "../src/store/documentStore.js";

export const noSleep = async (): Promise<void> => {};

export const fastRetry: RetryOptions = { attempts: 3, initialDelayMs: 1, multiplier: 1, sleep: noSleep };

export const FIXED_NOW = "2026-03-01T10:00:00.000Z";

export async function memoryDb(): Promise<{ pool: pg.Pool; db: Kysely<DB> }> {
  const pool = createPool(null);
  await applySchema(pool, path.resolve("db/schema.sql"));
  return { pool, db: createDb(pool) };
}

/** Run state kept in a Map, with the shared locking and regression rules. */
export class MemoryRunStateStore extends BaseRunStateStore {
  protected readonly backendName = "memory";
  readonly records = new Map<string, RunState>();

  constructor(logger: Logger, clock?: () => string) {
    super(logger, clock);
  }

  protected async readRecord(runTraceId: string): Promise<RunState | null> {
    return this.records.get(runTraceId) ?? null;
  }

  protected async writeRecord(state: RunState): Promise<void> {
    this.records.set(state.runTraceId, state);
  }
}

export class MemoryDocumentStore implements DocumentStore {
  readonly docs = new Map<string, { container: string; partitionKey: string; body: JsonObject }>();

  private key(container: string, partitionKey: string, id: string): string {
    return `${container}|${partitionKey}|${id}`;
  }

  async upsert(container: string, partitionKey: string, doc: DocumentBody): Promise<void> {
    this.docs.set(this.key(container, partitionKey, doc.id), { container, partitionKey, body: { ...doc } });
  }

  async readItem(container: string, id: string, partitionKey: string): Promise<JsonObject | null> {
    return this.docs.get(this.key(container, partitionKey, id))?.body ?? null;
  }

  async queryById(container: string, id: string): Promise<JsonObject[]> {
    return [...this.docs.values()]
      .filter((d) => d.container === container && (d.body.id === id || d.body.runTraceId === id))
      .map((d) => d.body);
  }
}

export interface FakeWorld {
  plans: Map<string, JsonObject>;
  captions: Map<string, string>;
  imageCaptions: string[];
  channelPosts: Array<{ channel: string; input: ChannelPostInput }>;
  published: PublishedPost[];
  failingChannels: Set<string>;
  calls: { content: number; image: number };
  imageError: Error | null;
  collaborators: Collaborators;
}

/** Collaborators backed by plain collections; plans are keyed `<brandId>/<postPlanId>`. */
export function fakeWorld(options: { withContent?: boolean } = {}): FakeWorld {
  const world: Omit<FakeWorld, "collaborators"> = {
    plans: new Map(),
    captions: new Map(),
    imageCaptions: [],
    channelPosts: [],
    published: [],
    failingChannels: new Set(),
    calls: { content: 0, image: 0 },
    imageError: null
  };

  const collaborators: Collaborators = {
    plans: {
      loadPostPlan: async (brandId, postPlanId) => world.plans.get(`${brandId}/${postPlanId}`) ?? null
    },
    content:
      options.withContent === false
        ? null
        : {
            generateContent: async () => {
              world.calls.content += 1;
              const contentRef = `content-${world.calls.content}`;
              world.captions.set(contentRef, "Fresh roast today");
              return { contentRef, caption: "Fresh roast today", hashtags: ["#coffee"] };
            }
          },
    images: {
      generateImage: async (_brandId, _postPlanId, _runTraceId, caption) => {
        world.calls.image += 1;
        world.imageCaptions.push(caption);
        if (world.imageError) throw world.imageError;
        return { mediaRef: "media-1", url: "file:///tmp/media-1.svg", provider: "placeholder" };
      }
    },
    contentLookup: {
      getCaption: async (contentRef) => world.captions.get(contentRef) ?? ""
    },
    channels: {
      postToChannel: async (channel, input) => {
        if (world.failingChannels.has(channel)) throw new Error(`${channel} rejected the post`);
        world.channelPosts.push({ channel, input });
        return { ref: `${channel}:${input.runTraceId}` };
      }
    },
    posts: {
      upsertPublishedPost: async (doc) => {
        world.published.push(doc);
      },
      queryById: async (id) => world.published.find((p) => p.id === id) ?? null
    }
  };

  return Object.assign(world, { collaborators });
}

export function seedPlan(world: FakeWorld, doc: JsonObject, brandId = "brand-1", postPlanId = "plan-1"): void {
  world.plans.set(`${brandId}/${postPlanId}`, { id: postPlanId, brandId, ...doc });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

export interface RecordedRequest {
  method: string;
  path: string;
  authorization: string | null;
  body: unknown;
}

/**
 * Fetch stand-in for the agent service. `runStatuses` are served in order to run status reads;
 * the last one repeats.
 */
export function scriptedAgentFetch(options: {
  reply: string;
  runStatuses?: Array<JsonObject | number>;
  baseUrl?: string;
}): { fetch: (input: string, init?: RequestInit) => Promise<Response>; requests: RecordedRequest[] } {
  const baseUrl = options.baseUrl ?? "http://agents.test";
  const statuses = options.runStatuses ?? [{ id: "run_a", status: "completed" }];
  const requests: RecordedRequest[] = [];
  let reads = 0;

  const fetchImpl = async (input: string, init?: RequestInit): Promise<Response> => {
    const method = init?.method ?? "GET";
    const route = input.startsWith(baseUrl) ? input.slice(baseUrl.length) : input;
    const rawBody = init?.body;
    const body: unknown = typeof rawBody === "string" ? JSON.parse(rawBody) : undefined;
    requests.push({ method, path: route, authorization: new Headers(init?.headers).get("authorization"), body });

    if (method === "POST" && route === "/threads") return jsonResponse({ id: "thread_1" });
    if (method === "POST" && route === "/threads/thread_1/messages") {
      return jsonResponse({ role: "user", content: "prompt" });
    }
    if (method === "POST" && route === "/threads/thread_1/runs") return jsonResponse({ id: "run_a", status: "queued" });
    if (method === "POST" && route === "/threads/thread_1/runs/run_a/submit_tool_outputs") {
      return jsonResponse({ id: "run_a", status: "in_progress" });
    }
    if (method === "GET" && route === "/threads/thread_1/runs/run_a") {
      const next = statuses[Math.min(reads, statuses.length - 1)];
      reads += 1;
      if (typeof next === "number") return new Response("unavailable", { status: next });
      return jsonResponse(next);
    }
    if (method === "GET" && route === "/threads/thread_1/messages") {
      return jsonResponse({
        data: [
          { role: "user", content: "prompt" },
          { role: "assistant", content: [{ type: "text", text: { value: options.reply } }] }
        ]
      });
    }
    return new Response("not found", { status: 404 });
  };

  return { fetch: fetchImpl, requests };
}
