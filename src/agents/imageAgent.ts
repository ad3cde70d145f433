import type { DocumentBrandLoader } from "../collaborators/documentRepositories.js";
import { CONTAINERS } from "../collaborators/documentRepositories.js";
import type { GeneratedMedia, ImageGenerator, PlanLoader } from "../collaborators/types.js";
import { ConfigurationError, MediaGenerationError, errorCode, errorMessage } from "../core/errors.js";
import { isJsonObject } from "../core/json.js";
import type { Logger } from "../core/log.js";
import { consoleLogger, info } from "../core/log.js";
import { renderPlaceholderSvg } from "../execution/fallback.js";
import type { MediaStore } from "../media/localMediaStore.js";
import { mediaIdOf } from "../media/localMediaStore.js";
import type { DocumentStore } from "../store/documentStore.js";
import type { AgentRunClient, AgentTool } from "./agentClient.js";
import { getBrandTool, getPostPlanTool, stringArg } from "./contextTools.js";
import type { ImageSearchClient, WebImageImporter } from "./imageTools.js";
import { persistImageFromUrlTool, searchImagesTool } from "./imageTools.js";

function instructions(canSearch: boolean): string {
  const find = canSearch
    ? "Search the web first (search_images) with brand and topic keywords. If a suitable image turns up, " +
      "call persist_image_from_url with its url and metadata. "
    : "If you know a suitable image url, call persist_image_from_url with it. ";
  return (
    "You are the image composer agent. Pick or create the best image for this post given the brand and plan. " +
    find +
    "Otherwise craft a concise prompt (<=60 tokens) and call generate_image_from_prompt. " +
    'Return only the final {"mediaRef": ..., "url": ...}.'
  );
}

function unquote(value: string): string {
  return value.trim().replace(/^"+|"+$/g, "");
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Reads `{mediaRef, url}` (optionally under `result`) from JSON, or from `key: value` lines. */
export function parseImageOutput(text: string): { mediaRef: string | null; url: string | null } {
  const trimmed = text.trim();
  const obj = tryParseJson(trimmed);
  if (isJsonObject(obj)) {
    const nested = isJsonObject(obj.result) ? obj.result : {};
    const mediaRef = obj.mediaRef ?? nested.mediaRef;
    const url = obj.url ?? nested.url;
    return {
      mediaRef: typeof mediaRef === "string" && mediaRef ? mediaRef : null,
      url: typeof url === "string" && url ? url : null
    };
  }
  let mediaRef: string | null = null;
  let url: string | null = null;
  for (const line of trimmed.split(/\r?\n/)) {
    const idx = line.indexOf(":");
    if (idx < 0) continue;
    const key = line.slice(0, idx).trim().toLowerCase();
    const value = unquote(line.slice(idx + 1));
    if (key.startsWith("mediaref")) mediaRef = value || null;
    else if (key.startsWith("url")) url = value || null;
  }
  return { mediaRef, url };
}

/** Renders the caption card, stores it, and records a `generatedMedia` document. */
export class PlaceholderImageGenerator implements ImageGenerator {
  private readonly logger: Logger;

  constructor(
    private readonly deps: { media: MediaStore; documents: DocumentStore; logger?: Logger }
  ) {
    this.logger = deps.logger ?? consoleLogger;
  }

  async generateImage(brandId: string, postPlanId: string, runTraceId: string, caption: string): Promise<GeneratedMedia> {
    const stored = await this.deps.media.putBytes({
      bytes: Buffer.from(renderPlaceholderSvg(caption), "utf8"),
      contentType: "image/svg+xml",
      extension: "svg"
    });
    const mediaId = mediaIdOf(stored.mediaRef);
    await this.deps.documents.upsert(CONTAINERS.media, brandId, {
      id: mediaId,
      partitionKey: brandId,
      type: "generatedMedia",
      brandId,
      postPlanId,
      runTraceId,
      media: { url: stored.url, format: "svg", provider: "placeholder", checksum: stored.checksumSha256 }
    });
    info(this.logger, runTraceId, "media:upsert", { mediaId, brandId, postPlanId, provider: "placeholder" });
    return { mediaRef: mediaId, url: stored.url, provider: "placeholder" };
  }
}

export class AgentImageGenerator implements ImageGenerator {
  constructor(
    private readonly deps: {
      client: AgentRunClient;
      brands: DocumentBrandLoader;
      plans: PlanLoader;
      placeholder: PlaceholderImageGenerator;
      importer: WebImageImporter;
      /** Offered to the agent as `search_images` when set. */
      search?: ImageSearchClient | null;
    }
  ) {}

  private generateTool(brandId: string, postPlanId: string, runTraceId: string, caption: string): AgentTool {
    return {
      definition: {
        name: "generate_image_from_prompt",
        description: "Create an image for the post from a short prompt and store it.",
        parameters: {
          type: "object",
          properties: { prompt: { type: "string" } },
          required: ["prompt"]
        }
      },
      handler: async (args) => {
        const prompt = stringArg(args, "prompt") ?? caption;
        const media = await this.deps.placeholder.generateImage(brandId, postPlanId, runTraceId, prompt);
        return { status: "completed", result: media };
      },
      eventData: (args) => ({ hasPrompt: Boolean(stringArg(args, "prompt")) })
    };
  }

  async generateImage(brandId: string, postPlanId: string, runTraceId: string, caption: string): Promise<GeneratedMedia> {
    const owner = { brandId, postPlanId, runTraceId };
    const search = this.deps.search ?? null;
    const tools: AgentTool[] = [
      getBrandTool(this.deps.brands, brandId),
      getPostPlanTool(this.deps.plans, { brandId, postPlanId }),
      ...(search ? [searchImagesTool(search)] : []),
      persistImageFromUrlTool(this.deps.importer, owner),
      this.generateTool(brandId, postPlanId, runTraceId, caption)
    ];

    let text: string;
    try {
      text = await this.deps.client.run({
        runTraceId,
        phase: "image",
        agentName: "image-composer-agent",
        instructions: instructions(search !== null),
        prompt:
          "Select the best image for this post.\n" +
          `brandId: ${brandId}\npostPlanId: ${postPlanId}\nrunTraceId: ${runTraceId}\n` +
          `caption: ${caption}\n` +
          "Return only the final image reference and url.",
        tools
      });
    } catch (err) {
      if (err instanceof ConfigurationError) throw err;
      throw new MediaGenerationError(errorMessage(err), { agent: "image-composer-agent", cause: errorCode(err) });
    }

    const parsed = parseImageOutput(text);
    if (parsed.mediaRef && parsed.url) {
      return { mediaRef: parsed.mediaRef, url: parsed.url, provider: "agent" };
    }
    // The agent answered without a usable reference.
    return this.deps.placeholder.generateImage(brandId, postPlanId, runTraceId, caption);
  }
}
