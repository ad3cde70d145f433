import type { JsonObject } from "../core/json.js";

export interface GeneratedContent {
  contentRef: string;
  caption: string;
  hashtags: string[];
}

export interface GeneratedMedia {
  mediaRef: string;
  url: string;
  provider: string | null;
}

export interface ContentGenerator {
  generateContent(brandId: string, postPlanId: string, runTraceId: string): Promise<GeneratedContent>;
}

export interface ImageGenerator {
  generateImage(brandId: string, postPlanId: string, runTraceId: string, caption: string): Promise<GeneratedMedia>;
}

export interface PlanLoader {
  /** Null when the plan does not exist. */
  loadPostPlan(brandId: string, postPlanId: string): Promise<JsonObject | null>;
}

/** Looks up the caption of a generated content document; "" when unknown. */
export interface ContentLookup {
  getCaption(contentRef: string): Promise<string>;
}

export interface ChannelPostInput {
  runTraceId: string;
  brandId: string;
  postPlanId: string;
  contentRef: string;
  mediaRef: string;
}

export interface ChannelPublisher {
  postToChannel(channel: string, input: ChannelPostInput): Promise<{ ref: string }>;
}

export interface PublishedPost {
  id: string;
  partitionKey: string;
  type: "publishedPost";
  brandId: string;
  postPlanId: string;
  runTraceId: string;
  publishedAtUtc: string;
  contentRef: string;
  mediaRef: string;
  status: "published";
  channels: Array<{ channel: string; status: "posted" | "failed"; ref: string | null; error: string | null }>;
}

export interface PublishedPostRepository {
  upsertPublishedPost(doc: PublishedPost): Promise<void>;
  queryById(id: string): Promise<PublishedPost | null>;
}

/** Everything a phase activity may call out to. A missing generator selects the fallback path. */
export interface Collaborators {
  plans: PlanLoader;
  content: ContentGenerator | null;
  images: ImageGenerator;
  contentLookup: ContentLookup;
  channels: ChannelPublisher;
  posts: PublishedPostRepository;
}
