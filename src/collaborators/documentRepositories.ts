import type { JsonObject } from "../core/json.js";
import { isJsonObject } from "../core/json.js";
import type { Logger } from "../core/log.js";
import { consoleLogger, info } from "../core/log.js";
import type { DocumentStore } from "../store/documentStore.js";
import type {
  ChannelPostInput,
  ChannelPublisher,
  ContentLookup,
  PlanLoader,
  PublishedPost,
  PublishedPostRepository
} from "./types.js";

export const CONTAINERS = {
  brands: "brands",
  postPlans: "post_plans",
  posts: "posts",
  channelPosts: "channel_posts",
  media: "media"
} as const;

/** Point read in the brand's partition, then a cross-partition lookup by id. */
async function readByBrand(documents: DocumentStore, container: string, id: string, brandId: string): Promise<JsonObject | null> {
  const direct = await documents.readItem(container, id, brandId);
  if (direct) return direct;
  const [first] = await documents.queryById(container, id);
  return first ?? null;
}

export class DocumentPlanLoader implements PlanLoader {
  constructor(private readonly documents: DocumentStore) {}

  loadPostPlan(brandId: string, postPlanId: string): Promise<JsonObject | null> {
    return readByBrand(this.documents, CONTAINERS.postPlans, postPlanId, brandId);
  }
}

export class DocumentBrandLoader {
  constructor(private readonly documents: DocumentStore) {}

  loadBrand(brandId: string): Promise<JsonObject | null> {
    return readByBrand(this.documents, CONTAINERS.brands, brandId, brandId);
  }
}

export class DocumentContentLookup implements ContentLookup {
  constructor(
    private readonly documents: DocumentStore,
    private readonly logger: Logger = consoleLogger
  ) {}

  async getCaption(contentRef: string): Promise<string> {
    const [doc] = await this.documents.queryById(CONTAINERS.posts, contentRef);
    if (!doc) {
      info(this.logger, null, "posts:query_miss", { contentRef });
      return "";
    }
    const content = isJsonObject(doc.content) ? doc.content : {};
    const caption = typeof content.caption === "string" ? content.caption : "";
    info(this.logger, null, "posts:query_hit", { contentRef, captionLen: caption.length });
    return caption;
  }
}

function isPublishedPost(doc: JsonObject): doc is JsonObject & PublishedPost {
  return doc.type === "publishedPost" && typeof doc.id === "string" && typeof doc.brandId === "string";
}

export class DocumentPostRepository implements PublishedPostRepository {
  constructor(
    private readonly documents: DocumentStore,
    private readonly logger: Logger = consoleLogger
  ) {}

  async upsertPublishedPost(doc: PublishedPost): Promise<void> {
    await this.documents.upsert(CONTAINERS.posts, doc.partitionKey, { ...doc });
    info(this.logger, doc.runTraceId, "posts:upsert_published", { postId: doc.id, brandId: doc.brandId });
  }

  async queryById(id: string): Promise<PublishedPost | null> {
    const matches = await this.documents.queryById(CONTAINERS.posts, id);
    return matches.find(isPublishedPost) ?? null;
  }
}

/**
 * Records each channel post as a document keyed by run and channel, so a redelivered
 * publish overwrites instead of duplicating.
 */
export class DocumentChannelPublisher implements ChannelPublisher {
  constructor(
    private readonly documents: DocumentStore,
    private readonly clock: () => string = () => new Date().toISOString()
  ) {}

  async postToChannel(channel: string, input: ChannelPostInput): Promise<{ ref: string }> {
    const id = `${input.runTraceId}:${channel}`;
    await this.documents.upsert(CONTAINERS.channelPosts, input.brandId, {
      id,
      type: "channelPost",
      channel,
      brandId: input.brandId,
      postPlanId: input.postPlanId,
      runTraceId: input.runTraceId,
      contentRef: input.contentRef,
      mediaRef: input.mediaRef,
      status: "posted",
      postedAtUtc: this.clock()
    });
    return { ref: id };
  }
}
