import { errorCode, errorMessage } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";
import type { Logger } from "../core/log.js";
import { error, info } from "../core/log.js";
import type { PipelinePhase, RunStatus } from "../core/run.js";
import type { PhaseSummary } from "../core/summary.js";
import { zPhaseSummary } from "../core/summary.js";
import type { RunStateStore, TelemetryResult } from "../state/runStateStore.js";

export interface RunContext {
  runTraceId: string;
  brandId: string;
  postPlanId: string;
}

export interface PhaseDeps {
  state: RunStateStore;
  logger: Logger;
}

/** Records one phase's lifecycle on the run state: start, then exactly one of success or failure. */
export class PhaseRun {
  readonly runTraceId: string;

  constructor(
    private readonly deps: PhaseDeps,
    private readonly info: RunContext & { phase: PipelinePhase }
  ) {
    this.runTraceId = info.runTraceId;
  }

  get phase(): PipelinePhase {
    return this.info.phase;
  }

  async start(): Promise<void> {
    await this.deps.state.setStatus(this.runTraceId, this.info.phase, "in_progress", {
      brandId: this.info.brandId,
      postPlanId: this.info.postPlanId
    });
    await this.event("start");
    info(this.deps.logger, this.runTraceId, `${this.info.phase}:start`, {
      brandId: this.info.brandId,
      postPlanId: this.info.postPlanId
    });
  }

  event(action: string, opts: { message?: string; status?: RunStatus; data?: JsonObject } = {}): Promise<TelemetryResult> {
    return this.deps.state.addEvent(this.runTraceId, { phase: this.info.phase, action, ...opts });
  }

  async finishSuccess(summary: PhaseSummary): Promise<void> {
    await this.event("agent_output", { data: summary });
    await this.deps.state.setStatus(this.runTraceId, this.info.phase, "completed", { summary });
    info(this.deps.logger, this.runTraceId, `${this.info.phase}:completed`);
  }

  async finishFailure(err: unknown): Promise<void> {
    const message = errorMessage(err);
    const code = errorCode(err);
    await this.event("error", { message, status: "failed" });
    await this.deps.state.setStatus(this.runTraceId, this.info.phase, "failed", {
      summary: { kind: "error", error: message, code }
    });
    error(this.deps.logger, this.runTraceId, `${this.info.phase}:failed`, { error: message, code });
  }
}

/**
 * Runs one phase body between start and terminal records. The summary is validated before it is
 * written; a failure of either the body or the summary is recorded and re-thrown.
 */
export async function executePhase<T>(
  deps: PhaseDeps,
  step: {
    phase: PipelinePhase;
    context: RunContext;
    invoke: (run: PhaseRun) => Promise<T>;
    summarize: (output: T) => PhaseSummary;
  }
): Promise<T> {
  const run = new PhaseRun(deps, { ...step.context, phase: step.phase });
  await run.start();

  let output: T;
  let summary: PhaseSummary;
  try {
    output = await step.invoke(run);
    summary = zPhaseSummary.parse(step.summarize(output));
  } catch (err) {
    await run.finishFailure(err);
    throw err;
  }

  await run.finishSuccess(summary);
  return output;
}
