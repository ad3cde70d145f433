import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorMessage } from "../core/errors.js";
import type { Logger } from "../core/log.js";
import { info } from "../core/log.js";
import type { JobAccepted, JobRequest } from "../execution/accept.js";
import type { RunStateStore } from "../state/runStateStore.js";
import type { TaskStatusResponse } from "../status/statusQuery.js";
import { getTaskStatus } from "../status/statusQuery.js";
import {
  zCheckTaskStatusInput,
  zCheckTaskStatusOutput,
  zOrchestrateInput,
  zOrchestrateOutput
} from "./toolSchemas.js";

export interface JobSubmitter {
  submit(job: JobRequest): Promise<JobAccepted>;
}

export interface GatewayDeps {
  state: RunStateStore;
  logger: Logger;
  /** Driver behind `orchestrate_content`, chosen by the `driver` setting. */
  primary: JobSubmitter;
  /** Workflow driver behind `durable_orchestrate`; the tool is not registered without one. */
  workflow?: JobSubmitter | null;
}

async function submitOrThrow(submitter: JobSubmitter, job: JobRequest): Promise<JobAccepted> {
  try {
    return await submitter.submit(job);
  } catch (e) {
    throw new McpError(ErrorCode.InternalError, `failed to start run: ${errorMessage(e)}`);
  }
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "content-relay-gateway",
    version: "0.1.0"
  });

  mcp.registerTool(
    "orchestrate_content",
    {
      description: "Start a content run (draft copy, generate media, publish) on the configured driver.",
      inputSchema: zOrchestrateInput,
      outputSchema: zOrchestrateOutput
    },
    async (args) => {
      const accepted = await submitOrThrow(deps.primary, { brandId: args.brand_id, postPlanId: args.post_plan_id });
      info(deps.logger, accepted.runTraceId, "gateway:orchestrate_content", { brandId: args.brand_id });
      return {
        content: [{ type: "text", text: `Accepted ${accepted.runTraceId}` }],
        structuredContent: { accepted: accepted.accepted, runTraceId: accepted.runTraceId }
      };
    }
  );

  const workflow = deps.workflow;
  if (workflow) {
    mcp.registerTool(
      "durable_orchestrate",
      {
        description: "Start a content run on the checkpointed workflow driver.",
        inputSchema: zOrchestrateInput,
        outputSchema: zOrchestrateOutput
      },
      async (args) => {
        const accepted = await submitOrThrow(workflow, { brandId: args.brand_id, postPlanId: args.post_plan_id });
        info(deps.logger, accepted.runTraceId, "gateway:durable_orchestrate", { brandId: args.brand_id });
        return {
          content: [{ type: "text", text: `Accepted ${accepted.runTraceId}` }],
          structuredContent: { accepted: accepted.accepted, runTraceId: accepted.runTraceId }
        };
      }
    );
  }

  mcp.registerTool(
    "check_task_status",
    {
      description: "Report the current phase and status of a run. Unknown runs read as orchestrate/pending.",
      inputSchema: zCheckTaskStatusInput,
      outputSchema: zCheckTaskStatusOutput
    },
    async (args) => {
      let status: TaskStatusResponse;
      try {
        status = await getTaskStatus(deps.state, args.run_trace_id);
      } catch (e) {
        throw new McpError(ErrorCode.InternalError, `run state unavailable: ${errorMessage(e)}`);
      }
      return {
        content: [{ type: "text", text: `${status.currentPhase}/${status.status}` }],
        structuredContent: { ...status }
      };
    }
  );

  return mcp;
}
