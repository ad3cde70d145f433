import path from "path";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { AgentRunClient } from "./agents/agentClient.js";
import { AgentContentGenerator } from "./agents/contentAgent.js";
import { AgentImageGenerator, PlaceholderImageGenerator } from "./agents/imageAgent.js";
import { ImageSearchClient, WebImageImporter } from "./agents/imageTools.js";
import {
  DocumentBrandLoader,
  DocumentChannelPublisher,
  DocumentContentLookup,
  DocumentPlanLoader,
  DocumentPostRepository
} from "./collaborators/documentRepositories.js";
import type { Collaborators } from "./collaborators/types.js";
import { loadConfig } from "./config/config.js";
import { consoleLogger, info } from "./core/log.js";
import { applySchema } from "./db/bootstrap.js";
import { createDb, createPool } from "./db/connection.js";
import { ChainedPipeline } from "./drivers/chainedPipeline.js";
import { PhaseActivities } from "./execution/phases.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { LocalMediaStore } from "./media/localMediaStore.js";
import { InMemoryQueueBroker } from "./queue/inMemoryQueue.js";
import { RedisStreamQueueBroker } from "./queue/redisStreamQueue.js";
import type { QueueBroker } from "./queue/types.js";
import { createRunStateStore, resolveRunStateBackend } from "./state/backendSelection.js";
import { PostgresDocumentStore } from "./store/documentStore.js";
import { FileCheckpointStore, PostgresCheckpointStore } from "./workflow/checkpointStore.js";
import { WorkflowHost } from "./workflow/coordinator.js";

async function main(): Promise<void> {
  const config = await loadConfig();
  const logger = consoleLogger;

  const pool = createPool(config.documents.databaseUrl);
  if (!config.documents.databaseUrl || config.documents.autoSchema) {
    await applySchema(pool);
  }
  const db = createDb(pool);
  const documents = new PostgresDocumentStore(db);
  const state = createRunStateStore(config, { documents, logger });

  const plans = new DocumentPlanLoader(documents);
  const brands = new DocumentBrandLoader(documents);
  const media = new LocalMediaStore(config.media.storeDir);
  const placeholder = new PlaceholderImageGenerator({ media, documents, logger });
  const importer = new WebImageImporter({ media, documents, logger });
  const search = config.media.searchEndpoint
    ? new ImageSearchClient({
        endpoint: config.media.searchEndpoint,
        apiKey: config.media.searchApiKey,
        safeSearch: config.media.searchSafeSearch,
        license: config.media.searchLicense
      })
    : null;
  const client = config.agents.endpoint
    ? new AgentRunClient({
        endpoint: config.agents.endpoint,
        apiKey: config.agents.apiKey,
        model: config.agents.model,
        pollIntervalMs: config.agents.pollIntervalMs,
        retry: config.retry,
        state,
        logger
      })
    : null;

  const collaborators: Collaborators = {
    plans,
    content: client ? new AgentContentGenerator({ client, documents, brands, plans, logger }) : null,
    images: client ? new AgentImageGenerator({ client, brands, plans, placeholder, importer, search }) : placeholder,
    contentLookup: new DocumentContentLookup(documents, logger),
    channels: new DocumentChannelPublisher(documents),
    posts: new DocumentPostRepository(documents, logger)
  };
  const activities = new PhaseActivities({ state, logger, collaborators, retry: config.retry });

  const queue: QueueBroker = config.queues.redisUrl
    ? RedisStreamQueueBroker.connect(config.queues.redisUrl, { maxDeliveries: config.queues.maxDeliveries, logger })
    : new InMemoryQueueBroker({ maxDeliveries: config.queues.maxDeliveries, logger });
  const chained = new ChainedPipeline({ state, logger, queue, queues: config.queues, activities });
  chained.start();

  const checkpoints =
    resolveRunStateBackend(config) === "remote"
      ? new PostgresCheckpointStore(db)
      : new FileCheckpointStore(path.join(config.runState.fileDir, "workflows"));
  const workflow = new WorkflowHost({ state, logger, checkpoints, activities });
  const workflowSubmitter = { submit: (job: { brandId: string; postPlanId: string }) => workflow.start(job) };

  const server = createGatewayServer({
    state,
    logger,
    primary: config.driver === "workflow" ? workflowSubmitter : chained,
    workflow: workflowSubmitter
  });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  info(logger, null, "gateway:ready", { driver: config.driver, backend: resolveRunStateBackend(config) });

  const shutdown = async (): Promise<void> => {
    chained.stop();
    await queue.close();
    await workflow.whenIdle();
    await server.close();
    await pool.end();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown().catch((err) => {
        console.error(err);
        process.exitCode = 1;
      });
    });
  }
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
