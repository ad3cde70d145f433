import * as z from "zod/v4";
import { CONTAINERS } from "../collaborators/documentRepositories.js";
import type { GeneratedMedia } from "../collaborators/types.js";
import { MediaGenerationError, errorMessage } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";
import { isJsonObject } from "../core/json.js";
import type { Logger } from "../core/log.js";
import { consoleLogger, info } from "../core/log.js";
import type { MediaStore } from "../media/localMediaStore.js";
import { mediaIdOf } from "../media/localMediaStore.js";
import type { DocumentStore } from "../store/documentStore.js";
import type { AgentTool, FetchLike } from "./agentClient.js";
import type { ToolResult } from "./contextTools.js";
import { invalidArgs, stringArg } from "./contextTools.js";

export type SafeSearch = "Off" | "Moderate" | "Strict";

export interface ImageCandidate {
  url: string;
  thumbnail: string | null;
  title: string | null;
  hostPage: string | null;
  width: number | null;
  height: number | null;
  encodingFormat: string | null;
  provider: string | null;
  license: string | null;
}

const zSearchItem = z.object({
  contentUrl: z.string().optional(),
  thumbnailUrl: z.string().optional(),
  name: z.string().optional(),
  hostPageUrl: z.string().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  encodingFormat: z.string().optional(),
  provider: z.array(z.object({ name: z.string().optional() })).optional(),
  insightsMetadata: z.unknown().optional()
});

const zSearchResponse = z.object({ value: z.array(zSearchItem).default([]) });

function licenseOf(insights: unknown): string | null {
  if (!isJsonObject(insights)) return null;
  return typeof insights.imageLicense === "string" ? insights.imageLicense : null;
}

export interface ImageSearchOptions {
  endpoint: string;
  apiKey: string | null;
  safeSearch?: SafeSearch;
  license?: string | null;
  fetch?: FetchLike;
}

/** Web image search returning candidates in the `value[]` shape of common image search APIs. */
export class ImageSearchClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: ImageSearchOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async search(query: string, opts: { count?: number; license?: string | null; safeSearch?: string | null } = {}): Promise<ImageCandidate[]> {
    const count = Math.min(Math.max(Math.trunc(opts.count ?? 8), 1), 16);
    const url = new URL(this.options.endpoint);
    url.searchParams.set("q", query);
    url.searchParams.set("count", String(count));
    url.searchParams.set("safeSearch", opts.safeSearch ?? this.options.safeSearch ?? "Moderate");
    url.searchParams.set("imageType", "Photo");
    url.searchParams.set("size", "Large");
    const license = opts.license ?? this.options.license ?? null;
    if (license) url.searchParams.set("license", license);

    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.options.apiKey) headers["Ocp-Apim-Subscription-Key"] = this.options.apiKey;
    const response = await this.fetchImpl(url.toString(), { method: "GET", headers });
    if (!response.ok) {
      throw new MediaGenerationError(`image search failed with HTTP ${response.status}`, { status: response.status });
    }
    const parsed = zSearchResponse.safeParse(await response.json());
    if (!parsed.success) throw new MediaGenerationError("image search returned an unexpected payload");

    const out: ImageCandidate[] = [];
    for (const item of parsed.data.value.slice(0, count)) {
      if (!item.contentUrl) continue;
      out.push({
        url: item.contentUrl,
        thumbnail: item.thumbnailUrl ?? null,
        title: item.name ?? null,
        hostPage: item.hostPageUrl ?? null,
        width: item.width ?? null,
        height: item.height ?? null,
        encodingFormat: item.encodingFormat ?? null,
        provider: item.provider?.[0]?.name ?? null,
        license: licenseOf(item.insightsMetadata)
      });
    }
    return out;
  }
}

export interface ImageSource {
  url: string;
  license?: string | null;
  title?: string | null;
  hostPage?: string | null;
  provider?: string | null;
  thumbnail?: string | null;
  width?: number | null;
  height?: number | null;
}

export interface MediaOwner {
  brandId: string;
  postPlanId: string;
  runTraceId: string;
}

const EXTENSIONS: Array<[string, string]> = [
  ["png", "png"],
  ["jpeg", "jpg"],
  ["jpg", "jpg"],
  ["gif", "gif"],
  ["webp", "webp"],
  ["svg", "svg"]
];

export function extensionFor(contentType: string): string {
  const lower = contentType.toLowerCase();
  return EXTENSIONS.find(([needle]) => lower.includes(needle))?.[1] ?? "bin";
}

/** Downloads an image, keeps a copy in the media store, and records where it came from. */
export class WebImageImporter {
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(private readonly deps: { media: MediaStore; documents: DocumentStore; fetch?: FetchLike; logger?: Logger }) {
    this.fetchImpl = deps.fetch ?? ((input, init) => fetch(input, init));
    this.logger = deps.logger ?? consoleLogger;
  }

  async importFromUrl(owner: MediaOwner, source: ImageSource): Promise<GeneratedMedia> {
    let response: Response;
    try {
      response = await this.fetchImpl(source.url, { method: "GET" });
    } catch (err) {
      throw new MediaGenerationError(`download failed: ${errorMessage(err)}`, { url: source.url });
    }
    if (!response.ok) {
      throw new MediaGenerationError(`download failed with HTTP ${response.status}`, { url: source.url, status: response.status });
    }

    const contentType = response.headers.get("content-type")?.split(";")[0]?.trim() || "image/jpeg";
    const format = extensionFor(contentType);
    const bytes = Buffer.from(await response.arrayBuffer());
    const stored = await this.deps.media.putBytes({ bytes, contentType, extension: format });
    const mediaId = mediaIdOf(stored.mediaRef);

    const meta: JsonObject = {
      sourceUrl: source.url,
      size: bytes.byteLength,
      format,
      license: source.license ?? null,
      title: source.title ?? null,
      hostPage: source.hostPage ?? null,
      provider: source.provider ?? null,
      thumbnail: source.thumbnail ?? null,
      width: source.width ?? null,
      height: source.height ?? null
    };
    await this.deps.documents.upsert(CONTAINERS.media, owner.brandId, {
      id: mediaId,
      partitionKey: owner.brandId,
      type: "generatedMedia",
      brandId: owner.brandId,
      postPlanId: owner.postPlanId,
      runTraceId: owner.runTraceId,
      media: { url: stored.url, format, provider: "web", checksum: stored.checksumSha256, meta }
    });
    info(this.logger, owner.runTraceId, "media:upsert", {
      mediaId,
      brandId: owner.brandId,
      postPlanId: owner.postPlanId,
      provider: "web"
    });
    return { mediaRef: mediaId, url: stored.url, provider: "web" };
  }
}

function numberArg(args: JsonObject, name: string): number | null {
  const v = args[name];
  return typeof v === "number" && Number.isFinite(v) ? v : null;
}

function itemCount(result: unknown): number {
  if (!isJsonObject(result) || !isJsonObject(result.result)) return 0;
  const items = result.result.items;
  return Array.isArray(items) ? items.length : 0;
}

export function searchImagesTool(search: ImageSearchClient): AgentTool {
  return {
    definition: {
      name: "search_images",
      description: "Search the web for candidate images.",
      parameters: {
        type: "object",
        properties: {
          query: { type: "string", description: "Search query for images" },
          count: { type: "integer", minimum: 1, maximum: 16 },
          license: { type: "string", description: "Optional license filter, e.g. ShareCommercially or Public" },
          safeSearch: { type: "string", description: "Off, Moderate or Strict" }
        },
        required: ["query"]
      }
    },
    handler: async (args): Promise<ToolResult> => {
      const query = stringArg(args, "query");
      if (!query) return invalidArgs("query is required");
      const items = await search.search(query, {
        count: numberArg(args, "count") ?? undefined,
        license: stringArg(args, "license"),
        safeSearch: stringArg(args, "safeSearch")
      });
      return { status: items.length > 0 ? "completed" : "failed", result: { items } };
    },
    eventData: (args, result) => ({ query: stringArg(args, "query"), count: itemCount(result) })
  };
}

export function persistImageFromUrlTool(importer: WebImageImporter, owner: MediaOwner): AgentTool {
  return {
    definition: {
      name: "persist_image_from_url",
      description: "Download an image url, store it, and record it as the post's media.",
      parameters: {
        type: "object",
        properties: {
          url: { type: "string" },
          license: { type: "string" },
          title: { type: "string" },
          hostPage: { type: "string" },
          provider: { type: "string" },
          thumbnail: { type: "string" },
          width: { type: "number" },
          height: { type: "number" }
        },
        required: ["url"]
      }
    },
    handler: async (args): Promise<ToolResult> => {
      const url = stringArg(args, "url");
      if (!url) return invalidArgs("url is required");
      if (!/^https?:\/\//i.test(url)) return invalidArgs("url must be http or https");
      try {
        const media = await importer.importFromUrl(owner, {
          url,
          license: stringArg(args, "license"),
          title: stringArg(args, "title"),
          hostPage: stringArg(args, "hostPage"),
          provider: stringArg(args, "provider"),
          thumbnail: stringArg(args, "thumbnail"),
          width: numberArg(args, "width"),
          height: numberArg(args, "height")
        });
        return { status: "completed", result: media };
      } catch (err) {
        return { status: "failed", error: { code: "download_failed", message: errorMessage(err) } };
      }
    },
    eventData: (args) => ({ url: stringArg(args, "url") })
  };
}
