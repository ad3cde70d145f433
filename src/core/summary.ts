import * as z from "zod/v4";

export const zOrchestrateSummary = z.object({
  kind: z.literal("orchestrate"),
  brandId: z.string(),
  postPlanId: z.string()
});

export const zCopywriterSummary = z.object({
  kind: z.literal("copywriter"),
  contentRef: z.string().min(1),
  caption: z.string(),
  hashtags: z.array(z.string()),
  fallback: z.boolean().default(false)
});

export const zImageSummary = z.object({
  kind: z.literal("image"),
  mediaRef: z.string(),
  url: z.string(),
  provider: z.string().nullable()
});

export const zChannelResult = z.object({
  channel: z.string(),
  status: z.enum(["posted", "failed"]),
  ref: z.string().nullable(),
  error: z.string().nullable()
});

export const zPublishSummary = z.object({
  kind: z.literal("publish"),
  postId: z.string().min(1),
  publishedAtUtc: z.string(),
  contentRef: z.string(),
  mediaRef: z.string(),
  channels: z.array(zChannelResult)
});

export const zErrorSummary = z.object({
  kind: z.literal("error"),
  error: z.string(),
  code: z.string()
});

export const zPhaseSummary = z.discriminatedUnion("kind", [
  zOrchestrateSummary,
  zCopywriterSummary,
  zImageSummary,
  zPublishSummary,
  zErrorSummary
]);

export type OrchestrateSummary = z.infer<typeof zOrchestrateSummary>;
export type CopywriterSummary = z.infer<typeof zCopywriterSummary>;
export type ImageSummary = z.infer<typeof zImageSummary>;
export type ChannelResult = z.infer<typeof zChannelResult>;
export type PublishSummary = z.infer<typeof zPublishSummary>;
export type ErrorSummary = z.infer<typeof zErrorSummary>;
export type PhaseSummary = z.infer<typeof zPhaseSummary>;

/** Returns null for anything that is not a recognised summary variant. */
export function parsePhaseSummary(value: unknown): PhaseSummary | null {
  const parsed = zPhaseSummary.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export const EMPTY_IMAGE_SUMMARY: ImageSummary = { kind: "image", mediaRef: "", url: "", provider: null };
