import { describe, it, expect } from "vitest";

import { AgentRunClient, contentToText } from "../src/agents/agentClient.js";
import type { AgentTool } from "../src/agents/agentClient.js";
import { AgentRunError, ConfigurationError } from "../src/core/errors.js";
import { MemoryLogger } from "../src/core/log.js";
import { FIXED_NOW, MemoryRunStateStore, noSleep, scriptedAgentFetch } from "./helpers.js";

const planTool: AgentTool = {
  definition: {
    name: "get_post_plan",
    description: "Fetch the post plan",
    parameters: { type: "object", properties: { postPlanId: { type: "string" } } }
  },
  handler: async (args) => ({ status: "completed", result: { id: args.postPlanId, channels: ["instagram"] } })
};

function request(tools: AgentTool[] = []) {
  return {
    runTraceId: "run_1",
    phase: "copywriter" as const,
    agentName: "copywriter-agent",
    instructions: "Write a caption.",
    prompt: "brandId: brand-1",
    tools
  };
}

describe("AgentRunClient", () => {
  it("requires an endpoint", () => {
    expect(() => new AgentRunClient({ endpoint: null, apiKey: null, model: null })).toThrow(ConfigurationError);
  });

  it("creates a run, serves tool calls and returns the assistant reply", async () => {
    const agent = scriptedAgentFetch({
      reply: "  Fresh roast today\n#coffee  ",
      runStatuses: [
        { id: "run_a", status: "in_progress" },
        {
          id: "run_a",
          status: "requires_action",
          required_action: {
            submit_tool_outputs: {
              tool_calls: [{ id: "call_1", function: { name: "get_post_plan", arguments: '{"postPlanId":"plan-1"}' } }]
            }
          }
        },
        { id: "run_a", status: "completed" }
      ]
    });
    const logger = new MemoryLogger();
    const state = new MemoryRunStateStore(logger, () => FIXED_NOW);
    const sleeps: number[] = [];
    const client = new AgentRunClient({
      endpoint: "http://agents.test/",
      apiKey: "test-secret",
      model: "test-model",
      pollIntervalMs: 10,
      fetch: agent.fetch,
      sleep: async (ms) => void sleeps.push(ms),
      state,
      logger
    });

    const text = await client.run(request([planTool]));

    expect(text).toBe("Fresh roast today\n#coffee");
    expect(sleeps).toEqual([10]);
    expect(agent.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
      "POST /threads",
      "POST /threads/thread_1/messages",
      "POST /threads/thread_1/runs",
      "GET /threads/thread_1/runs/run_a",
      "GET /threads/thread_1/runs/run_a",
      "POST /threads/thread_1/runs/run_a/submit_tool_outputs",
      "GET /threads/thread_1/runs/run_a",
      "GET /threads/thread_1/messages"
    ]);
    expect(agent.requests.every((r) => r.authorization === "Bearer test-secret")).toBe(true);

    const created = agent.requests[2]?.body;
    expect(created).toEqual({
      agent: {
        name: "copywriter-agent",
        model: "test-model",
        instructions: "Write a caption.",
        tools: [{ type: "function", function: planTool.definition }]
      },
      metadata: { runTraceId: "run_1" }
    });
    expect(agent.requests[5]?.body).toEqual({
      tool_outputs: [
        {
          tool_call_id: "call_1",
          output: JSON.stringify({ status: "completed", result: { id: "plan-1", channels: ["instagram"] } })
        }
      ]
    });

    const run = await state.getStatus("run_1");
    expect(run?.events).toEqual([
      { ts: FIXED_NOW, phase: "copywriter", action: "tool:get_post_plan", data: { args: { postPlanId: "plan-1" } } }
    ]);
  });

  it("answers unknown tools with a failure output", async () => {
    const agent = scriptedAgentFetch({
      reply: "done",
      runStatuses: [
        {
          id: "run_a",
          status: "requires_action",
          required_action: { submit_tool_outputs: { tool_calls: [{ id: "call_9", function: { name: "delete_everything" } }] } }
        },
        { id: "run_a", status: "completed" }
      ]
    });
    const client = new AgentRunClient({
      endpoint: "http://agents.test",
      apiKey: null,
      model: null,
      fetch: agent.fetch,
      sleep: noSleep,
      logger: new MemoryLogger()
    });

    await client.run(request());

    const submitted = agent.requests.find((r) => r.path.endsWith("/submit_tool_outputs"));
    expect(submitted?.body).toEqual({
      tool_outputs: [
        {
          tool_call_id: "call_9",
          output: JSON.stringify({ status: "failed", error: { code: "unknown_tool", message: "delete_everything" } })
        }
      ]
    });
    expect(submitted?.authorization).toBeNull();
  });

  it("fails when the run ends unsuccessfully", async () => {
    const agent = scriptedAgentFetch({
      reply: "",
      runStatuses: [{ id: "run_a", status: "failed", last_error: { code: "rate_limited" } }]
    });
    const client = new AgentRunClient({
      endpoint: "http://agents.test",
      apiKey: null,
      model: null,
      fetch: agent.fetch,
      sleep: noSleep,
      logger: new MemoryLogger()
    });

    const attempt = client.run(request());
    await expect(attempt).rejects.toBeInstanceOf(AgentRunError);
    await expect(attempt).rejects.toThrow('Agent run failed: {"code":"rate_limited"}');
  });

  it("backs off after a failed status read", async () => {
    const agent = scriptedAgentFetch({ reply: "ok", runStatuses: [503, { id: "run_a", status: "completed" }] });
    const logger = new MemoryLogger();
    const sleeps: number[] = [];
    const client = new AgentRunClient({
      endpoint: "http://agents.test",
      apiKey: null,
      model: null,
      pollIntervalMs: 10,
      fetch: agent.fetch,
      sleep: async (ms) => void sleeps.push(ms),
      logger
    });

    expect(await client.run(request())).toBe("ok");
    expect(sleeps).toEqual([20]);
    expect(logger.events("warn")).toEqual(["agent:poll_failed"]);
  });
});

describe("contentToText", () => {
  it("reads the supported content shapes", () => {
    expect(contentToText("plain")).toBe("plain");
    expect(contentToText([{ type: "text", text: "a" }, { type: "text", text: { value: "b" } }, 7])).toBe("a\nb");
    expect(contentToText(null)).toBe("");
  });
});
