import type { PartitionKeyPath } from "../config/config.js";
import type { Logger } from "../core/log.js";
import { consoleLogger, info, warn } from "../core/log.js";
import type { RunState } from "../core/run.js";
import type { RetryOptions } from "../execution/retry.js";
import { retryWithBackoff } from "../execution/retry.js";
import type { DocumentStore } from "../store/documentStore.js";
import type { TelemetryResult } from "./runStateStore.js";
import { BaseRunStateStore, decodeRunState, encodeRunState } from "./runStateStore.js";

export function partitionKeyFor(
  partitionKeyPath: string,
  ids: { runTraceId: string; brandId: string | null; postPlanId: string | null }
): string {
  switch (partitionKeyPath.toLowerCase()) {
    case "/brandid":
      return ids.brandId ?? ids.runTraceId;
    case "/postplanid":
      return ids.postPlanId ?? ids.runTraceId;
    default:
      // runTraceId, partitionKey, id and unknown paths all key by run.
      return ids.runTraceId;
  }
}

export interface RemoteRunStateStoreOptions {
  container: string;
  partitionKeyPath: PartitionKeyPath;
  retry?: RetryOptions;
  logger?: Logger;
  clock?: () => string;
}

export class RemoteRunStateStore extends BaseRunStateStore {
  protected readonly backendName = "remote";
  private readonly container: string;
  private readonly partitionKeyPath: PartitionKeyPath;
  private readonly retry: RetryOptions;

  constructor(
    private readonly documents: DocumentStore,
    options: RemoteRunStateStoreOptions
  ) {
    super(options.logger ?? consoleLogger, options.clock);
    this.container = options.container;
    this.partitionKeyPath = options.partitionKeyPath;
    this.retry = options.retry ?? {};
  }

  protected override mutate(op: () => Promise<TelemetryResult>): Promise<TelemetryResult> {
    return retryWithBackoff(() => op(), {
      ...this.retry,
      onRetry: (err, attempt, delayMs) =>
        warn(this.logger, null, "run_state:remote_retry", { attempt, delayMs, error: String(err) })
    });
  }

  protected async readRecord(runTraceId: string): Promise<RunState | null> {
    // Records written under a brand or plan partition miss the point read and are found by query.
    const direct = await this.documents.readItem(this.container, runTraceId, runTraceId);
    if (direct) {
      info(this.logger, runTraceId, "run_state:read_status", { method: "read_item" });
      return decodeRunState(direct);
    }
    const matches = await this.documents.queryById(this.container, runTraceId);
    const first = matches[0];
    if (!first) return null;
    info(this.logger, runTraceId, "run_state:read_status", { method: "query" });
    return decodeRunState(first);
  }

  protected async writeRecord(state: RunState): Promise<void> {
    const partitionKey = partitionKeyFor(this.partitionKeyPath, state);
    await this.documents.upsert(this.container, partitionKey, {
      ...encodeRunState(state),
      id: state.runTraceId,
      partitionKey
    });
  }
}
