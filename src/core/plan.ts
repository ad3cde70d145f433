import * as z from "zod/v4";
import type { JsonObject } from "./json.js";
import { isJsonObject } from "./json.js";

export const MEDIA_TYPES = ["image", "multi-image", "video", "text"] as const;
export type MediaType = (typeof MEDIA_TYPES)[number];

export interface PostPlanView {
  brandId: string;
  postPlanId: string;
  mediaType: MediaType;
  channels: string[];
  topics: string[];
  hashtags: string[];
}

export const zPostPlanView: z.ZodType<PostPlanView> = z.object({
  brandId: z.string(),
  postPlanId: z.string(),
  mediaType: z.enum(MEDIA_TYPES),
  channels: z.array(z.string()),
  topics: z.array(z.string()),
  hashtags: z.array(z.string())
});

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string" && v.trim().length > 0);
}

function normalizeMediaType(value: unknown): MediaType {
  const raw = Array.isArray(value) ? value[0] : value;
  // A plan without a media type carries no media.
  if (typeof raw !== "string") return "text";
  switch (raw.trim().toLowerCase()) {
    case "text":
    case "text-only":
      return "text";
    case "multi-image":
    case "carousel":
      return "multi-image";
    case "video":
      return "video";
    default:
      return "image";
  }
}

function child(doc: JsonObject, key: string): JsonObject {
  const v = doc[key];
  return isJsonObject(v) ? v : {};
}

/**
 * Accepts both the flat shape (`media.type`, `channels`) and the nested plan shape
 * (`plan.info.type`, `plan.info.platforms`, `plan.content`).
 */
export function toPostPlanView(doc: JsonObject, brandId: string, postPlanId: string): PostPlanView {
  const plan = isJsonObject(doc.plan) ? doc.plan : child(doc, "post_plan");
  const info = child(plan, "info");
  const content = child(plan, "content");
  const media = child(doc, "media");

  const mediaType = normalizeMediaType(media.type ?? info.type);
  const channels = stringList(doc.channels).length > 0 ? stringList(doc.channels) : stringList(info.platforms);

  return {
    brandId: typeof doc.brandId === "string" ? doc.brandId : brandId,
    postPlanId,
    mediaType,
    channels,
    topics: stringList(content.topics),
    hashtags: stringList(content.hashtags)
  };
}

export function requiresMedia(plan: PostPlanView): boolean {
  return plan.mediaType !== "text";
}
