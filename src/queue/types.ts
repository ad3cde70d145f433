export interface Delivery {
  id: string;
  queue: string;
  /** 1 on first delivery, incremented on each redelivery. */
  attempt: number;
}

/** Receives the raw message body. Throwing leaves the message for redelivery. */
export type QueueHandler = (body: string, delivery: Delivery) => Promise<void>;

export interface QueueBroker {
  enqueue(queue: string, payload: unknown): Promise<string>;
  subscribe(queue: string, handler: QueueHandler): () => void;
  close(): Promise<void>;
}

export const DEFAULT_MAX_DELIVERIES = 5;

export function poisonQueueName(queue: string): string {
  return `${queue}-poison`;
}
