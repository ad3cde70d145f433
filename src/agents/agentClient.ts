import { setTimeout as delay } from "timers/promises";
import * as z from "zod/v4";
import { AgentRunError, ConfigurationError, errorMessage } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";
import { isJsonObject } from "../core/json.js";
import type { Logger } from "../core/log.js";
import { consoleLogger, info, warn } from "../core/log.js";
import type { PipelinePhase } from "../core/run.js";
import type { RetryOptions } from "../execution/retry.js";
import { retryWithBackoff } from "../execution/retry.js";
import type { RunStateStore } from "../state/runStateStore.js";

export interface AgentToolDefinition {
  name: string;
  description: string;
  parameters: JsonObject;
}

export interface AgentTool {
  definition: AgentToolDefinition;
  handler: (args: JsonObject) => Promise<unknown>;
  /** Shapes the `tool:<name>` event data; defaults to the call arguments. */
  eventData?: (args: JsonObject, result: unknown) => JsonObject;
}

export interface AgentRunRequest {
  runTraceId: string;
  phase: PipelinePhase;
  agentName: string;
  instructions: string;
  prompt: string;
  tools: AgentTool[];
}

const zToolCall = z.object({
  id: z.string(),
  function: z.object({
    name: z.string(),
    arguments: z.string().optional()
  })
});

const zRun = z.object({
  id: z.string(),
  status: z.string(),
  required_action: z
    .object({
      submit_tool_outputs: z.object({ tool_calls: z.array(zToolCall) }).optional()
    })
    .nullish(),
  last_error: z.unknown().optional()
});

const zThread = z.object({ id: z.string() });

const zMessage = z.object({
  role: z.string(),
  content: z.unknown()
});

const zMessageList = z.object({ data: z.array(zMessage) });

type AgentRun = z.infer<typeof zRun>;
type ToolCall = z.infer<typeof zToolCall>;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface AgentRunClientOptions {
  endpoint: string | null;
  apiKey: string | null;
  model: string | null;
  pollIntervalMs?: number;
  /** Upper bound of the wait after a failed status read. */
  maxPollBackoffMs?: number;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  retry?: RetryOptions;
  state?: RunStateStore | null;
  logger?: Logger;
}

/** Pulls plain text out of string, `[{text}]` and `[{text: {value}}]` message contents. */
export function contentToText(content: unknown): string {
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) return "";
  const chunks: string[] = [];
  for (const part of content) {
    if (!isJsonObject(part)) continue;
    const candidates = [part.text, part.content, part.value];
    for (const c of candidates) {
      if (typeof c === "string") {
        chunks.push(c);
        break;
      }
      if (isJsonObject(c) && typeof c.value === "string") {
        chunks.push(c.value);
        break;
      }
    }
  }
  return chunks.join("\n");
}

function parseArgs(raw: string | undefined): JsonObject {
  if (!raw) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return isJsonObject(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

const TERMINAL_OK = new Set(["succeeded", "completed"]);
const TERMINAL_FAILED = new Set(["failed", "cancelled", "canceled", "expired"]);

/**
 * Client for a thread/run style agent service. A run is created, polled until it settles,
 * and tool calls it requests are executed locally and their outputs submitted back.
 */
export class AgentRunClient {
  private readonly endpoint: string;
  private readonly pollIntervalMs: number;
  private readonly maxPollBackoffMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(private readonly options: AgentRunClientOptions) {
    if (!options.endpoint) throw new ConfigurationError("AGENT_ENDPOINT is required for the agent client");
    this.endpoint = options.endpoint.replace(/\/$/, "");
    this.pollIntervalMs = options.pollIntervalMs ?? 750;
    this.maxPollBackoffMs = options.maxPollBackoffMs ?? 3000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
    this.logger = options.logger ?? consoleLogger;
  }

  private async request<T>(method: string, path: string, schema: z.ZodType<T>, body?: unknown): Promise<T> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.apiKey) headers.Authorization = `Bearer ${this.options.apiKey}`;

    const response = await this.fetchImpl(`${this.endpoint}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body)
    });
    if (!response.ok) {
      const text = await response.text();
      throw new AgentRunError(`${method} ${path} returned ${response.status}: ${text}`, { status: response.status });
    }
    const json: unknown = await response.json();
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new AgentRunError(`${method} ${path} returned an unexpected body: ${z.prettifyError(parsed.error)}`);
    }
    return parsed.data;
  }

  private retrying<T>(attempts: number, op: () => Promise<T>): Promise<T> {
    return retryWithBackoff(() => op(), { ...this.options.retry, attempts });
  }

  async run(req: AgentRunRequest): Promise<string> {
    const thread = await this.retrying(3, () => this.request("POST", "/threads", zThread, {}));
    await this.request("POST", `/threads/${thread.id}/messages`, zMessage, { role: "user", content: req.prompt });

    let run = await this.retrying(3, () =>
      this.request("POST", `/threads/${thread.id}/runs`, zRun, {
        agent: {
          name: req.agentName,
          model: this.options.model,
          instructions: req.instructions,
          tools: req.tools.map((t) => ({ type: "function", function: t.definition }))
        },
        metadata: { runTraceId: req.runTraceId }
      })
    );
    info(this.logger, req.runTraceId, "agent:run_created", { agent: req.agentName, threadId: thread.id, runId: run.id });

    let backoffMs = this.pollIntervalMs;
    for (;;) {
      try {
        run = await this.request("GET", `/threads/${thread.id}/runs/${run.id}`, zRun);
      } catch (err) {
        warn(this.logger, req.runTraceId, "agent:poll_failed", { runId: run.id, error: errorMessage(err) });
        await this.sleep(Math.min(backoffMs * 2, this.maxPollBackoffMs));
        backoffMs = Math.min(backoffMs * 1.5, this.maxPollBackoffMs);
        continue;
      }

      const status = run.status.toLowerCase();
      if (TERMINAL_OK.has(status)) break;
      if (TERMINAL_FAILED.has(status)) {
        throw new AgentRunError(`Agent run ${status}: ${JSON.stringify(run.last_error ?? null)}`, {
          agent: req.agentName,
          runId: run.id
        });
      }
      if (status === "requires_action") {
        const calls = run.required_action?.submit_tool_outputs?.tool_calls ?? [];
        const outputs = await this.runTools(req, calls);
        const runId = run.id;
        run = await this.retrying(4, () =>
          this.request("POST", `/threads/${thread.id}/runs/${runId}/submit_tool_outputs`, zRun, { tool_outputs: outputs })
        );
        continue;
      }
      await this.sleep(this.pollIntervalMs);
    }

    return this.finalAssistantText(thread.id);
  }

  private async runTools(req: AgentRunRequest, calls: ToolCall[]): Promise<Array<{ tool_call_id: string; output: string }>> {
    const outputs: Array<{ tool_call_id: string; output: string }> = [];
    for (const call of calls) {
      const name = call.function.name;
      const args = parseArgs(call.function.arguments);
      const tool = req.tools.find((t) => t.definition.name === name);
      let result: unknown;
      if (!tool) {
        result = { status: "failed", error: { code: "unknown_tool", message: name } };
      } else {
        try {
          result = await tool.handler(args);
        } catch (err) {
          result = { status: "failed", error: { code: "tool_error", message: errorMessage(err) } };
        }
        await this.options.state?.addEvent(req.runTraceId, {
          phase: req.phase,
          action: `tool:${name}`,
          data: tool.eventData ? tool.eventData(args, result) : { args }
        });
      }
      outputs.push({ tool_call_id: call.id, output: JSON.stringify(result) });
    }
    return outputs;
  }

  private async finalAssistantText(threadId: string): Promise<string> {
    let messages: Array<z.infer<typeof zMessage>>;
    try {
      messages = (await this.request("GET", `/threads/${threadId}/messages`, zMessageList)).data;
    } catch (err) {
      warn(this.logger, null, "agent:messages_unavailable", { threadId, error: errorMessage(err) });
      messages = [];
    }
    const assistant = messages.filter((m) => m.role === "assistant");
    const last = assistant[assistant.length - 1] ?? messages[messages.length - 1];
    return last ? contentToText(last.content).trim() : "";
  }
}
