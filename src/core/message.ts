import * as z from "zod/v4";
import { MessageValidationError } from "./errors.js";

export const QUEUE_STEPS = ["generate_content", "generate_image", "publish"] as const;
export type QueueStep = (typeof QUEUE_STEPS)[number];

export const QUEUE_AGENTS = ["copywriter", "composer-image", "none"] as const;
export type QueueAgent = (typeof QUEUE_AGENTS)[number];

export const zQueueRefs = z.object({
  contentRef: z.string().optional(),
  mediaRef: z.string().optional()
});

export const zQueueMessage = z.object({
  runTraceId: z.string().min(1),
  brandId: z.string().min(1),
  postPlanId: z.string().min(1),
  step: z.enum(QUEUE_STEPS),
  agent: z.enum(QUEUE_AGENTS).default("none"),
  refs: zQueueRefs.default({}),
  args: z.record(z.string(), z.unknown()).default({})
});

export type QueueRefs = z.infer<typeof zQueueRefs>;
export type QueueMessage = z.infer<typeof zQueueMessage>;

const AGENT_FOR_STEP: Record<QueueStep, QueueAgent> = {
  generate_content: "copywriter",
  generate_image: "composer-image",
  publish: "none"
};

export function parseQueueMessage(raw: unknown): QueueMessage {
  let value: unknown = raw;
  if (typeof raw === "string") {
    try {
      value = JSON.parse(raw);
    } catch {
      throw new MessageValidationError("queue message is not valid JSON");
    }
  }
  const parsed = zQueueMessage.safeParse(value);
  if (!parsed.success) {
    throw new MessageValidationError(`invalid queue message: ${z.prettifyError(parsed.error)}`);
  }
  return parsed.data;
}

export function firstMessage(input: { runTraceId: string; brandId: string; postPlanId: string }): QueueMessage {
  return {
    runTraceId: input.runTraceId,
    brandId: input.brandId,
    postPlanId: input.postPlanId,
    step: "generate_content",
    agent: AGENT_FOR_STEP.generate_content,
    refs: {},
    args: {}
  };
}

/** Carries ids and accumulated refs forward; later refs win. */
export function nextMessage(prev: QueueMessage, step: QueueStep, refs: QueueRefs): QueueMessage {
  return {
    runTraceId: prev.runTraceId,
    brandId: prev.brandId,
    postPlanId: prev.postPlanId,
    step,
    agent: AGENT_FOR_STEP[step],
    refs: { ...prev.refs, ...refs },
    args: prev.args
  };
}
