import { randomBytes } from "crypto";
import { errorMessage } from "../core/errors.js";
import type { Logger } from "../core/log.js";
import { consoleLogger, error, warn } from "../core/log.js";
import type { QueueBroker, QueueHandler } from "./types.js";
import { DEFAULT_MAX_DELIVERIES, poisonQueueName } from "./types.js";

interface Entry {
  id: string;
  body: string;
  deliveries: number;
}

/**
 * Process-local broker with the same at-least-once contract as the Redis one: a throwing
 * handler gets the message again until `maxDeliveries`, then it lands on `<queue>-poison`.
 */
export class InMemoryQueueBroker implements QueueBroker {
  private readonly queues = new Map<string, Entry[]>();
  private readonly handlers = new Map<string, QueueHandler>();
  private readonly pumping = new Set<string>();
  private readonly active = new Set<Promise<void>>();
  private readonly maxDeliveries: number;
  private readonly logger: Logger;
  private closed = false;

  constructor(options: { maxDeliveries?: number; logger?: Logger } = {}) {
    this.maxDeliveries = options.maxDeliveries ?? DEFAULT_MAX_DELIVERIES;
    this.logger = options.logger ?? consoleLogger;
  }

  private entries(queue: string): Entry[] {
    let list = this.queues.get(queue);
    if (!list) {
      list = [];
      this.queues.set(queue, list);
    }
    return list;
  }

  async enqueue(queue: string, payload: unknown): Promise<string> {
    if (this.closed) throw new Error("queue broker is closed");
    const id = `${Date.now()}-${randomBytes(4).toString("hex")}`;
    this.entries(queue).push({ id, body: JSON.stringify(payload), deliveries: 0 });
    this.pump(queue);
    return id;
  }

  subscribe(queue: string, handler: QueueHandler): () => void {
    if (this.handlers.has(queue)) throw new Error(`queue ${queue} already has a consumer`);
    this.handlers.set(queue, handler);
    this.pump(queue);
    return () => {
      if (this.handlers.get(queue) === handler) this.handlers.delete(queue);
    };
  }

  /** Bodies currently waiting on `queue`, oldest first. */
  peek(queue: string): unknown[] {
    return (this.queues.get(queue) ?? []).map((e): unknown => JSON.parse(e.body));
  }

  /** Resolves once every subscribed queue has drained. */
  async whenIdle(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.all([...this.active]);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    this.handlers.clear();
    await this.whenIdle();
  }

  private pump(queue: string): void {
    if (this.pumping.has(queue) || !this.handlers.has(queue)) return;
    this.pumping.add(queue);
    const run: Promise<void> = this.drain(queue)
      .catch((err) => error(this.logger, null, "queue:drain_failed", { queue, error: errorMessage(err) }))
      .finally(() => {
        this.pumping.delete(queue);
        this.active.delete(run);
        if ((this.queues.get(queue)?.length ?? 0) > 0) this.pump(queue);
      });
    this.active.add(run);
  }

  private async drain(queue: string): Promise<void> {
    // Yield first so enqueue() returns before the handler runs.
    await Promise.resolve();
    const list = this.entries(queue);
    for (;;) {
      const handler = this.handlers.get(queue);
      const entry = list.shift();
      if (!handler || !entry) {
        if (entry) list.unshift(entry);
        return;
      }
      entry.deliveries += 1;
      try {
        await handler(entry.body, { id: entry.id, queue, attempt: entry.deliveries });
      } catch (err) {
        if (entry.deliveries >= this.maxDeliveries) {
          this.entries(poisonQueueName(queue)).push({ ...entry, deliveries: 0 });
          error(this.logger, null, "queue:poisoned", { queue, id: entry.id, deliveries: entry.deliveries, error: errorMessage(err) });
          this.pump(poisonQueueName(queue));
        } else {
          list.push(entry);
          warn(this.logger, null, "queue:redelivered", { queue, id: entry.id, attempt: entry.deliveries, error: errorMessage(err) });
        }
      }
    }
  }
}
