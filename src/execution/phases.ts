import type * as z from "zod/v4";
import type { ChannelPostInput, Collaborators } from "../collaborators/types.js";
import { PipelineError, PublishError, ResourceNotFoundError, errorCode, errorMessage } from "../core/errors.js";
import { newPostId } from "../core/ids.js";
import type { Logger } from "../core/log.js";
import { info, warn } from "../core/log.js";
import type { PostPlanView } from "../core/plan.js";
import { requiresMedia, toPostPlanView } from "../core/plan.js";
import type { PipelinePhase } from "../core/run.js";
import { utcNow } from "../core/run.js";
import type { ChannelResult, CopywriterSummary, ImageSummary, PublishSummary } from "../core/summary.js";
import { EMPTY_IMAGE_SUMMARY, zChannelResult, zPublishSummary } from "../core/summary.js";
import type { RunStateStore } from "../state/runStateStore.js";
import { fallbackContent } from "./fallback.js";
import type { RunContext } from "./phaseRun.js";
import { executePhase } from "./phaseRun.js";
import type { RetryOptions } from "./retry.js";
import { retryWithBackoff } from "./retry.js";

export interface PublishRefs {
  contentRef: string;
  mediaRef: string;
}

/**
 * How the publish phase runs its sub-steps. The workflow driver supplies a checkpointing
 * implementation; the chained driver runs them directly.
 */
export interface StepRunner {
  step<T>(name: string, schema: z.ZodType<T>, fn: () => Promise<T>): Promise<T>;
  fanOut<T>(
    schema: z.ZodType<T>,
    tasks: Array<{ name: string; fn: () => Promise<T> }>
  ): Promise<Array<PromiseSettledResult<Awaited<T>>>>;
}

export const directSteps: StepRunner = {
  step: (_name, _schema, fn) => fn(),
  fanOut: (_schema, tasks) => Promise.allSettled(tasks.map((t) => t.fn()))
};

export interface PhaseActivitiesDeps {
  state: RunStateStore;
  logger: Logger;
  collaborators: Collaborators;
  retry?: RetryOptions;
  clock?: () => string;
  newPostId?: () => string;
}

function asPublishError(err: unknown, details: { channel?: string; postId?: string }): PipelineError {
  return err instanceof PipelineError ? err : new PublishError(errorMessage(err), details);
}

/** Phase bodies shared by both drivers. */
export class PhaseActivities {
  constructor(private readonly deps: PhaseActivitiesDeps) {}

  private withRetry<T>(runTraceId: string, label: string, op: () => Promise<T>): Promise<T> {
    return retryWithBackoff(() => op(), {
      ...this.deps.retry,
      onRetry: (err, attempt, delayMs) =>
        warn(this.deps.logger, runTraceId, "retry:attempt_failed", { op: label, attempt, delayMs, error: errorMessage(err) })
    });
  }

  /**
   * Reads and normalises the post plan. A failure is recorded against `phase`, the phase
   * that needed the plan, and re-thrown.
   */
  async loadPlan(ctx: RunContext, phase: PipelinePhase): Promise<PostPlanView> {
    try {
      const doc = await this.withRetry(ctx.runTraceId, "load_post_plan", () =>
        this.deps.collaborators.plans.loadPostPlan(ctx.brandId, ctx.postPlanId)
      );
      if (!doc) throw new ResourceNotFoundError("post_plan", ctx.postPlanId, { brandId: ctx.brandId });
      const plan = toPostPlanView(doc, ctx.brandId, ctx.postPlanId);
      info(this.deps.logger, ctx.runTraceId, "plan:loaded", { mediaType: plan.mediaType, channels: plan.channels.length });
      return plan;
    } catch (err) {
      const message = errorMessage(err);
      await this.deps.state.addEvent(ctx.runTraceId, { phase, action: "error", message, status: "failed" });
      await this.deps.state.setStatus(ctx.runTraceId, phase, "failed", {
        summary: { kind: "error", error: message, code: errorCode(err) }
      });
      throw err;
    }
  }

  runCopywriter(ctx: RunContext): Promise<CopywriterSummary> {
    return executePhase(this.deps, {
      phase: "copywriter",
      context: ctx,
      invoke: async (run): Promise<CopywriterSummary> => {
        const generator = this.deps.collaborators.content;
        if (!generator) {
          await run.event("fallback", { message: "no content generator configured" });
          return fallbackContent(ctx.brandId, ctx.postPlanId);
        }
        const out = await this.withRetry(ctx.runTraceId, "generate_content", () =>
          generator.generateContent(ctx.brandId, ctx.postPlanId, ctx.runTraceId)
        );
        return { kind: "copywriter", contentRef: out.contentRef, caption: out.caption, hashtags: out.hashtags, fallback: false };
      },
      summarize: (out) => out
    });
  }

  /** Looks up the caption recorded for a content reference. */
  async captionFor(ctx: RunContext, contentRef: string | undefined): Promise<string> {
    if (!contentRef) return "";
    try {
      return await this.deps.collaborators.contentLookup.getCaption(contentRef);
    } catch (err) {
      warn(this.deps.logger, ctx.runTraceId, "content:caption_lookup_failed", { contentRef, error: errorMessage(err) });
      return "";
    }
  }

  /** Text-only plans skip the image phase and record nothing for it. */
  async runImage(ctx: RunContext, plan: PostPlanView, caption: string): Promise<ImageSummary> {
    if (!requiresMedia(plan)) {
      info(this.deps.logger, ctx.runTraceId, "image:skipped", { mediaType: plan.mediaType });
      return EMPTY_IMAGE_SUMMARY;
    }
    return this.generateImage(ctx, caption);
  }

  generateImage(ctx: RunContext, caption: string): Promise<ImageSummary> {
    return executePhase(this.deps, {
      phase: "image",
      context: ctx,
      invoke: async (): Promise<ImageSummary> => {
        const out = await this.withRetry(ctx.runTraceId, "generate_image", () =>
          this.deps.collaborators.images.generateImage(ctx.brandId, ctx.postPlanId, ctx.runTraceId, caption)
        );
        return { kind: "image", mediaRef: out.mediaRef, url: out.url, provider: out.provider };
      },
      summarize: (out) => out
    });
  }

  async postToChannel(ctx: RunContext, channel: string, refs: PublishRefs): Promise<ChannelResult> {
    const input: ChannelPostInput = { ...ctx, ...refs };
    try {
      const out = await this.withRetry(ctx.runTraceId, `post_to_channel:${channel}`, () =>
        this.deps.collaborators.channels.postToChannel(channel, input)
      );
      return { channel, status: "posted", ref: out.ref, error: null };
    } catch (err) {
      throw asPublishError(err, { channel });
    }
  }

  async persistPublish(ctx: RunContext, refs: PublishRefs, channels: ChannelResult[]): Promise<PublishSummary> {
    const postId = (this.deps.newPostId ?? newPostId)();
    const publishedAtUtc = (this.deps.clock ?? utcNow)();
    try {
      await this.withRetry(ctx.runTraceId, "persist_post", () =>
        this.deps.collaborators.posts.upsertPublishedPost({
          id: postId,
          partitionKey: ctx.brandId,
          type: "publishedPost",
          brandId: ctx.brandId,
          postPlanId: ctx.postPlanId,
          runTraceId: ctx.runTraceId,
          publishedAtUtc,
          contentRef: refs.contentRef,
          mediaRef: refs.mediaRef,
          status: "published",
          channels
        })
      );
    } catch (err) {
      throw asPublishError(err, { postId });
    }
    info(this.deps.logger, ctx.runTraceId, "publish:persisted", { postId, brandId: ctx.brandId });
    return { kind: "publish", postId, publishedAtUtc, contentRef: refs.contentRef, mediaRef: refs.mediaRef, channels };
  }

  /**
   * Posts to every channel, waits for all of them, then persists the published post.
   * Channel failures are kept in the result; only a persist failure fails the phase.
   */
  runPublish(ctx: RunContext, plan: PostPlanView, refs: PublishRefs, steps: StepRunner = directSteps): Promise<PublishSummary> {
    return executePhase(this.deps, {
      phase: "publish",
      context: ctx,
      invoke: async (run): Promise<PublishSummary> => {
        const settled = await steps.fanOut(
          zChannelResult,
          plan.channels.map((channel) => ({
            name: `post_to_channel:${channel}`,
            fn: () => this.postToChannel(ctx, channel, refs)
          }))
        );

        const channels: ChannelResult[] = [];
        for (const [i, result] of settled.entries()) {
          const channel = plan.channels[i] ?? `channel-${i}`;
          if (result.status === "fulfilled") {
            channels.push(result.value);
            continue;
          }
          const message = errorMessage(result.reason);
          channels.push({ channel, status: "failed", ref: null, error: message });
          await run.event("channel_failed", { message, data: { channel } });
          warn(this.deps.logger, ctx.runTraceId, "publish:channel_failed", { channel, error: message });
        }

        return steps.step("persist_post", zPublishSummary, () => this.persistPublish(ctx, refs, channels));
      },
      summarize: (out) => out
    });
  }
}
