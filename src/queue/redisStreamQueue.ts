import { hostname } from "os";
import { setTimeout as delay } from "timers/promises";
import { Redis } from "ioredis";
import { errorMessage } from "../core/errors.js";
import type { Logger } from "../core/log.js";
import { consoleLogger, error, info, warn } from "../core/log.js";
import type { QueueBroker, QueueHandler } from "./types.js";
import { DEFAULT_MAX_DELIVERIES, poisonQueueName } from "./types.js";

/** The slice of an ioredis connection the broker uses. */
export interface StreamCommands {
  call(command: string, ...args: Array<string | number>): Promise<unknown>;
  quit(): Promise<unknown>;
  disconnect(): void;
}

export interface RedisStreamQueueOptions {
  group?: string;
  consumer?: string;
  maxDeliveries?: number;
  blockMs?: number;
  /** Pending entries idle this long are reclaimed for redelivery. */
  claimIdleMs?: number;
  batchSize?: number;
  logger?: Logger;
}

interface StreamEntry {
  id: string;
  data: string;
}

function fieldsToData(fields: unknown): string | null {
  if (!Array.isArray(fields)) return null;
  for (let i = 0; i + 1 < fields.length; i += 2) {
    if (String(fields[i]) === "data") return String(fields[i + 1]);
  }
  return null;
}

function parseEntries(raw: unknown): StreamEntry[] {
  if (!Array.isArray(raw)) return [];
  const out: StreamEntry[] = [];
  for (const item of raw) {
    if (!Array.isArray(item) || item.length < 2) continue;
    const data = fieldsToData(item[1]);
    if (data !== null) out.push({ id: String(item[0]), data });
  }
  return out;
}

/** XREADGROUP reply: [[stream, [[id, fields], ...]], ...] or null. */
export function parseReadGroupReply(reply: unknown): StreamEntry[] {
  if (!Array.isArray(reply)) return [];
  return reply.flatMap((stream: unknown) => (Array.isArray(stream) ? parseEntries(stream[1]) : []));
}

/** XAUTOCLAIM reply: [nextCursor, [[id, fields], ...], deletedIds]. */
export function parseAutoClaimReply(reply: unknown): StreamEntry[] {
  if (!Array.isArray(reply)) return [];
  return parseEntries(reply[1]);
}

/**
 * Redis streams broker: one stream per queue, one consumer group shared by all workers.
 * Entries stay pending until acknowledged; failed ones are reclaimed with XAUTOCLAIM after
 * `claimIdleMs` and moved to `<queue>-poison` once delivered `maxDeliveries` times.
 */
export class RedisStreamQueueBroker implements QueueBroker {
  private readonly group: string;
  private readonly consumer: string;
  private readonly maxDeliveries: number;
  private readonly blockMs: number;
  private readonly claimIdleMs: number;
  private readonly batchSize: number;
  private readonly logger: Logger;
  private readonly loops = new Map<string, { abort: AbortController; done: Promise<void> }>();

  constructor(
    private readonly commands: StreamCommands,
    private readonly blocking: StreamCommands,
    options: RedisStreamQueueOptions = {}
  ) {
    this.group = options.group ?? "content-relay";
    this.consumer = options.consumer ?? `${hostname()}-${process.pid}`;
    this.maxDeliveries = options.maxDeliveries ?? DEFAULT_MAX_DELIVERIES;
    this.blockMs = options.blockMs ?? 5000;
    this.claimIdleMs = options.claimIdleMs ?? 60_000;
    this.batchSize = options.batchSize ?? 10;
    this.logger = options.logger ?? consoleLogger;
  }

  static connect(redisUrl: string, options: RedisStreamQueueOptions = {}): RedisStreamQueueBroker {
    const commands = new Redis(redisUrl, { maxRetriesPerRequest: 3 });
    // Blocking reads need their own connection.
    const blocking = new Redis(redisUrl, { maxRetriesPerRequest: null });
    const logger = options.logger ?? consoleLogger;
    for (const conn of [commands, blocking]) {
      conn.on("error", (err: Error) => warn(logger, null, "queue:redis_error", { error: err.message }));
    }
    return new RedisStreamQueueBroker(commands, blocking, options);
  }

  async enqueue(queue: string, payload: unknown): Promise<string> {
    const id = await this.commands.call("XADD", queue, "*", "data", JSON.stringify(payload));
    return String(id);
  }

  async ensureGroup(queue: string): Promise<void> {
    try {
      await this.commands.call("XGROUP", "CREATE", queue, this.group, "0", "MKSTREAM");
    } catch (err) {
      if (errorMessage(err).includes("BUSYGROUP")) return;
      throw err;
    }
  }

  subscribe(queue: string, handler: QueueHandler): () => void {
    if (this.loops.has(queue)) throw new Error(`queue ${queue} already has a consumer`);
    const abort = new AbortController();
    const done = this.consume(queue, handler, abort.signal).catch((err) =>
      error(this.logger, null, "queue:consumer_stopped", { queue, error: errorMessage(err) })
    );
    this.loops.set(queue, { abort, done });
    info(this.logger, null, "queue:subscribed", { queue, group: this.group, consumer: this.consumer });
    return () => {
      abort.abort();
      this.loops.delete(queue);
    };
  }

  async close(): Promise<void> {
    const loops = [...this.loops.values()];
    this.loops.clear();
    for (const l of loops) l.abort.abort();
    // QUIT would queue behind a pending BLOCK read; dropping the socket rejects it at once.
    this.blocking.disconnect();
    await Promise.all(loops.map((l) => l.done));
    await this.commands.quit();
  }

  private async consume(queue: string, handler: QueueHandler, signal: AbortSignal): Promise<void> {
    await this.ensureGroup(queue);
    while (!signal.aborted) {
      try {
        const claimed = parseAutoClaimReply(
          await this.commands.call(
            "XAUTOCLAIM",
            queue,
            this.group,
            this.consumer,
            this.claimIdleMs,
            "0-0",
            "COUNT",
            this.batchSize
          )
        );
        for (const entry of claimed) await this.deliver(queue, entry, handler);
        if (signal.aborted) break;

        const fresh = parseReadGroupReply(
          await this.blocking.call(
            "XREADGROUP",
            "GROUP",
            this.group,
            this.consumer,
            "COUNT",
            this.batchSize,
            "BLOCK",
            this.blockMs,
            "STREAMS",
            queue,
            ">"
          )
        );
        for (const entry of fresh) await this.deliver(queue, entry, handler);
      } catch (err) {
        if (signal.aborted) break;
        error(this.logger, null, "queue:read_failed", { queue, error: errorMessage(err) });
        await delay(1000);
      }
    }
  }

  private async deliveryCount(queue: string, id: string): Promise<number> {
    const reply = await this.commands.call("XPENDING", queue, this.group, id, id, 1);
    if (Array.isArray(reply) && Array.isArray(reply[0])) {
      const count = Number(reply[0][3]);
      if (Number.isFinite(count) && count > 0) return count;
    }
    return 1;
  }

  private async deliver(queue: string, entry: StreamEntry, handler: QueueHandler): Promise<void> {
    const attempt = await this.deliveryCount(queue, entry.id);
    try {
      await handler(entry.data, { id: entry.id, queue, attempt });
      await this.commands.call("XACK", queue, this.group, entry.id);
    } catch (err) {
      if (attempt >= this.maxDeliveries) {
        await this.commands.call("XADD", poisonQueueName(queue), "*", "data", entry.data, "error", errorMessage(err));
        await this.commands.call("XACK", queue, this.group, entry.id);
        error(this.logger, null, "queue:poisoned", { queue, id: entry.id, deliveries: attempt, error: errorMessage(err) });
        return;
      }
      warn(this.logger, null, "queue:redelivery_pending", { queue, id: entry.id, attempt, error: errorMessage(err) });
    }
  }
}
