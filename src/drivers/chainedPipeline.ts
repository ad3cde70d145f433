import { errorCode, errorMessage } from "../core/errors.js";
import { newRunTraceId } from "../core/ids.js";
import type { Logger } from "../core/log.js";
import { error, info } from "../core/log.js";
import type { QueueMessage, QueueRefs, QueueStep } from "../core/message.js";
import { firstMessage, nextMessage, parseQueueMessage } from "../core/message.js";
import { requiresMedia } from "../core/plan.js";
import type { PipelinePhase } from "../core/run.js";
import { phaseRank } from "../core/run.js";
import type { JobAccepted, JobRequest } from "../execution/accept.js";
import { seedRun } from "../execution/accept.js";
import type { RunContext } from "../execution/phaseRun.js";
import type { PhaseActivities } from "../execution/phases.js";
import type { QueueBroker } from "../queue/types.js";
import type { RunStateStore } from "../state/runStateStore.js";

export interface QueueNames {
  content: string;
  media: string;
  publish: string;
}

export interface ChainedPipelineDeps {
  state: RunStateStore;
  logger: Logger;
  queue: QueueBroker;
  queues: QueueNames;
  activities: PhaseActivities;
  newRunTraceId?: () => string;
}

function contextOf(msg: QueueMessage): RunContext {
  return { runTraceId: msg.runTraceId, brandId: msg.brandId, postPlanId: msg.postPlanId };
}

/**
 * Message-chained driver. Each queue consumer runs one phase and enqueues the message that
 * triggers the next; the run state record and the message are the only shared state.
 */
export class ChainedPipeline {
  private unsubscribers: Array<() => void> = [];

  constructor(private readonly deps: ChainedPipelineDeps) {}

  async submit(job: JobRequest): Promise<JobAccepted> {
    const runTraceId = (this.deps.newRunTraceId ?? newRunTraceId)();
    await seedRun(this.deps, runTraceId, job);

    const msg = firstMessage({ runTraceId, ...job });
    try {
      await this.deps.queue.enqueue(this.deps.queues.content, msg);
    } catch (err) {
      await this.recordEnqueueFailure(runTraceId, "orchestrate", this.deps.queues.content, err);
      throw err;
    }
    await this.deps.state.addEvent(runTraceId, {
      phase: "orchestrate",
      action: "enqueued_next",
      data: { next: this.deps.queues.content, step: msg.step }
    });
    return { accepted: true, runTraceId };
  }

  async handleContentTask(body: unknown): Promise<void> {
    const msg = parseQueueMessage(body);
    const ctx = contextOf(msg);
    if (await this.isStale(msg, "copywriter")) return;

    const plan = await this.deps.activities.loadPlan(ctx, "copywriter");
    const content = await this.deps.activities.runCopywriter(ctx);
    if (requiresMedia(plan)) {
      await this.forward(msg, "copywriter", this.deps.queues.media, "generate_image", { contentRef: content.contentRef });
    } else {
      await this.forward(msg, "copywriter", this.deps.queues.publish, "publish", {
        contentRef: content.contentRef,
        mediaRef: ""
      });
    }
  }

  async handleMediaTask(body: unknown): Promise<void> {
    const msg = parseQueueMessage(body);
    const ctx = contextOf(msg);
    if (await this.isStale(msg, "image")) return;

    const caption = await this.deps.activities.captionFor(ctx, msg.refs.contentRef);
    const image = await this.deps.activities.generateImage(ctx, caption);
    await this.forward(msg, "image", this.deps.queues.publish, "publish", { mediaRef: image.mediaRef });
  }

  async handlePublishTask(body: unknown): Promise<void> {
    const msg = parseQueueMessage(body);
    const ctx = contextOf(msg);
    if (await this.isStale(msg, "publish")) return;

    const plan = await this.deps.activities.loadPlan(ctx, "publish");
    await this.deps.activities.runPublish(ctx, plan, {
      contentRef: msg.refs.contentRef ?? "",
      mediaRef: msg.refs.mediaRef ?? ""
    });
  }

  start(): void {
    if (this.unsubscribers.length > 0) return;
    const { queue, queues } = this.deps;
    this.unsubscribers = [
      queue.subscribe(queues.content, (body) => this.handleContentTask(body)),
      queue.subscribe(queues.media, (body) => this.handleMediaTask(body)),
      queue.subscribe(queues.publish, (body) => this.handlePublishTask(body))
    ];
    info(this.deps.logger, null, "chained:started", { ...queues });
  }

  stop(): void {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
  }

  private async forward(prev: QueueMessage, phase: PipelinePhase, queue: string, step: QueueStep, refs: QueueRefs): Promise<void> {
    const next = nextMessage(prev, step, refs);
    try {
      await this.deps.queue.enqueue(queue, next);
    } catch (err) {
      await this.recordEnqueueFailure(prev.runTraceId, phase, queue, err);
      throw err;
    }
    await this.deps.state.addEvent(prev.runTraceId, { phase, action: "enqueued_next", data: { next: queue, step } });
  }

  /** The phase's own work is done but the run cannot advance, so the phase is marked failed. */
  private async recordEnqueueFailure(runTraceId: string, phase: PipelinePhase, queue: string, err: unknown): Promise<void> {
    const message = errorMessage(err);
    await this.deps.state.addEvent(runTraceId, { phase, action: "error", message, status: "failed" });
    await this.deps.state.setStatus(runTraceId, phase, "failed", {
      summary: { kind: "error", error: message, code: errorCode(err) }
    });
    error(this.deps.logger, runTraceId, `${phase}:enqueue_failed`, { queue, error: message });
  }

  /**
   * A redelivered message for a phase the run has already moved past, or for a publish that
   * already completed, is acknowledged and dropped.
   */
  private async isStale(msg: QueueMessage, phase: PipelinePhase): Promise<boolean> {
    const current = await this.deps.state.getStatus(msg.runTraceId);
    if (!current) return false;
    const finishedPublish = phase === "publish" && current.currentPhase === "publish" && current.status === "completed";
    if (!finishedPublish && phaseRank(current.currentPhase) <= phaseRank(phase)) return false;
    info(this.deps.logger, msg.runTraceId, "queue:stale_message_skipped", {
      step: msg.step,
      currentPhase: current.currentPhase
    });
    return true;
  }
}
