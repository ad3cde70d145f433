import * as z from "zod/v4";
import { ResourceNotFoundError, errorMessage } from "../core/errors.js";
import { newRunTraceId } from "../core/ids.js";
import type { Logger } from "../core/log.js";
import { error, info } from "../core/log.js";
import { zPostPlanView } from "../core/plan.js";
import type { PublishSummary } from "../core/summary.js";
import { zCopywriterSummary, zImageSummary, zPublishSummary } from "../core/summary.js";
import type { JobAccepted, JobRequest } from "../execution/accept.js";
import { seedRun } from "../execution/accept.js";
import type { RunContext } from "../execution/phaseRun.js";
import type { PhaseActivities, StepRunner } from "../execution/phases.js";
import type { RunStateStore } from "../state/runStateStore.js";
import type { StepRecord, WorkflowCheckpointStore } from "./checkpointStore.js";

const INPUT_STEP = "workflow:input";
const RESULT_STEP = "workflow:result";

const zRunContext = z.object({
  runTraceId: z.string().min(1),
  brandId: z.string().min(1),
  postPlanId: z.string().min(1)
});

/**
 * Checkpointed activity runner for one workflow instance. Completed steps replay their recorded
 * output; failed steps keep their error on record and run again when the instance is re-driven.
 */
export class WorkflowContext implements StepRunner {
  private constructor(
    readonly instanceId: string,
    private readonly store: WorkflowCheckpointStore,
    private readonly history: Map<string, StepRecord>,
    private readonly logger: Logger
  ) {}

  static async load(store: WorkflowCheckpointStore, instanceId: string, logger: Logger): Promise<WorkflowContext> {
    return new WorkflowContext(instanceId, store, await store.load(instanceId), logger);
  }

  private replay<T>(name: string, schema: z.ZodType<T>): { hit: true; value: T } | { hit: false } {
    const rec = this.history.get(name);
    if (!rec || rec.status !== "completed") return { hit: false };
    const parsed = schema.safeParse(rec.output);
    if (!parsed.success) return { hit: false };
    info(this.logger, this.instanceId, "workflow:replayed", { step: name });
    return { hit: true, value: parsed.data };
  }

  private async record(name: string, rec: StepRecord): Promise<void> {
    this.history.set(name, rec);
    await this.store.save(this.instanceId, name, rec);
  }

  async callActivity<T>(name: string, schema: z.ZodType<T>, fn: () => Promise<T>): Promise<T> {
    const replayed = this.replay(name, schema);
    if (replayed.hit) return replayed.value;
    let output: T;
    try {
      output = await fn();
    } catch (err) {
      await this.record(name, { status: "failed", error: errorMessage(err) });
      throw err;
    }
    await this.record(name, { status: "completed", output });
    return output;
  }

  /** Runs every branch to completion, checkpointing each settled result. */
  async callAll<T>(
    schema: z.ZodType<T>,
    tasks: Array<{ name: string; fn: () => Promise<T> }>
  ): Promise<Array<PromiseSettledResult<Awaited<T>>>> {
    return Promise.allSettled(tasks.map((t) => this.callActivity(t.name, schema, t.fn)));
  }

  step<T>(name: string, schema: z.ZodType<T>, fn: () => Promise<T>): Promise<T> {
    return this.callActivity(name, schema, fn);
  }

  fanOut<T>(
    schema: z.ZodType<T>,
    tasks: Array<{ name: string; fn: () => Promise<T> }>
  ): Promise<Array<PromiseSettledResult<Awaited<T>>>> {
    return this.callAll(schema, tasks);
  }

  has(name: string): boolean {
    return this.history.get(name)?.status === "completed";
  }

  get<T>(name: string, schema: z.ZodType<T>): T | null {
    const replayed = this.replay(name, schema);
    return replayed.hit ? replayed.value : null;
  }
}

/**
 * load plan -> copywriter -> image when the plan needs media -> post to every channel -> persist.
 * Phase state is written by the activities themselves, exactly as under the chained driver.
 */
export async function runContentWorkflow(
  ctx: WorkflowContext,
  activities: PhaseActivities,
  input: RunContext
): Promise<PublishSummary> {
  const plan = await ctx.callActivity("load_post_plan", zPostPlanView, () => activities.loadPlan(input, "copywriter"));
  const content = await ctx.callActivity("generate_content", zCopywriterSummary, () => activities.runCopywriter(input));
  const image = await ctx.callActivity("generate_media", zImageSummary, () =>
    activities.runImage(input, plan, content.caption)
  );
  return activities.runPublish(input, plan, { contentRef: content.contentRef, mediaRef: image.mediaRef }, ctx);
}

export interface WorkflowHostDeps {
  state: RunStateStore;
  logger: Logger;
  checkpoints: WorkflowCheckpointStore;
  activities: PhaseActivities;
  newRunTraceId?: () => string;
}

/** Starts, resumes and tracks workflow instances; the instance id is the run trace id. */
export class WorkflowHost {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly deps: WorkflowHostDeps) {}

  async start(job: JobRequest): Promise<JobAccepted> {
    const runTraceId = (this.deps.newRunTraceId ?? newRunTraceId)();
    await seedRun(this.deps, runTraceId, job);
    const input: RunContext = { runTraceId, ...job };
    await this.deps.checkpoints.save(runTraceId, INPUT_STEP, { status: "completed", output: input });
    await this.deps.state.addEvent(runTraceId, { phase: "orchestrate", action: "workflow_started", data: { instanceId: runTraceId } });
    this.launch(input);
    return { accepted: true, runTraceId };
  }

  /** Re-drives an instance from its checkpoints; a finished instance returns its recorded result. */
  async resume(runTraceId: string): Promise<PublishSummary> {
    const ctx = await WorkflowContext.load(this.deps.checkpoints, runTraceId, this.deps.logger);
    const done = ctx.get(RESULT_STEP, zPublishSummary);
    if (done) return done;
    const input = ctx.get(INPUT_STEP, zRunContext);
    if (!input) throw new ResourceNotFoundError("workflow instance", runTraceId);
    info(this.deps.logger, runTraceId, "workflow:resumed");
    return this.drive(ctx, input);
  }

  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private async drive(ctx: WorkflowContext, input: RunContext): Promise<PublishSummary> {
    const result = await runContentWorkflow(ctx, this.deps.activities, input);
    await ctx.callActivity(RESULT_STEP, zPublishSummary, async () => result);
    info(this.deps.logger, input.runTraceId, "workflow:completed", { postId: result.postId });
    return result;
  }

  private launch(input: RunContext): void {
    const run: Promise<void> = WorkflowContext.load(this.deps.checkpoints, input.runTraceId, this.deps.logger)
      .then((ctx) => this.drive(ctx, input))
      .then(
        () => undefined,
        // Failures are already on the run state; the instance stays resumable.
        (err: unknown) => error(this.deps.logger, input.runTraceId, "workflow:failed", { error: errorMessage(err) })
      )
      .finally(() => {
        this.inFlight.delete(run);
      });
    this.inFlight.add(run);
  }
}
