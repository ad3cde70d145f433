import type { PipelineConfig } from "../config/config.js";
import { ConfigurationError } from "../core/errors.js";
import type { Logger } from "../core/log.js";
import type { DocumentStore } from "../store/documentStore.js";
import { FileRunStateStore } from "./fileRunStateStore.js";
import { RemoteRunStateStore } from "./remoteRunStateStore.js";
import type { RunStateStore } from "./runStateStore.js";

export type RunStateBackend = "file" | "remote";

export function resolveRunStateBackend(config: Pick<PipelineConfig, "runState" | "documents">): RunStateBackend {
  const setting = config.runState.backend;
  if (setting === "file" || setting === "remote") return setting;
  return config.documents.databaseUrl ? "remote" : "file";
}

export function createRunStateStore(
  config: Pick<PipelineConfig, "runState" | "documents" | "retry">,
  deps: { documents?: DocumentStore | null; logger?: Logger }
): RunStateStore {
  const backend = resolveRunStateBackend(config);
  if (backend === "file") {
    return new FileRunStateStore(config.runState.fileDir, deps.logger);
  }
  if (!deps.documents) {
    throw new ConfigurationError("remote run state backend selected but no document store is configured", {
      backend
    });
  }
  return new RemoteRunStateStore(deps.documents, {
    container: config.runState.container,
    partitionKeyPath: config.runState.partitionKeyPath,
    retry: config.retry,
    logger: deps.logger
  });
}
