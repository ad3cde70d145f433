import type { DocumentBrandLoader } from "../collaborators/documentRepositories.js";
import { CONTAINERS } from "../collaborators/documentRepositories.js";
import type { ContentGenerator, GeneratedContent, PlanLoader } from "../collaborators/types.js";
import { ConfigurationError, ContentGenerationError, errorCode, errorMessage } from "../core/errors.js";
import { newContentId } from "../core/ids.js";
import type { Logger } from "../core/log.js";
import { consoleLogger, info } from "../core/log.js";
import type { DocumentStore } from "../store/documentStore.js";
import type { AgentRunClient } from "./agentClient.js";
import { getBrandTool, getPostPlanTool } from "./contextTools.js";

const INSTRUCTIONS =
  "You are the copywriter agent. Draft concise social captions that match the brand's voice and the post plan brief. " +
  "Use the available tools to fetch brand and post plan context before writing. " +
  "Return a single best caption on the first line and the hashtags on the following lines.";

/**
 * The first non-empty line is the caption and `#` tokens on later lines are hashtags,
 * but only when the text carries hashtags at all; otherwise the whole text is the caption.
 */
export function parseCopywriterOutput(text: string): { caption: string; hashtags: string[] } {
  const trimmed = text.trim();
  if (!trimmed.includes("\n#") && !trimmed.startsWith("#")) {
    return { caption: trimmed, hashtags: [] };
  }
  const lines = trimmed
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter(Boolean);
  const [caption = "", ...rest] = lines;
  const hashtags = rest
    .join(" ")
    .split(/\s+/)
    .filter((t) => t.startsWith("#"));
  return { caption, hashtags };
}

export class AgentContentGenerator implements ContentGenerator {
  private readonly logger: Logger;

  constructor(
    private readonly deps: {
      client: AgentRunClient;
      documents: DocumentStore;
      brands: DocumentBrandLoader;
      plans: PlanLoader;
      logger?: Logger;
      newContentId?: () => string;
    }
  ) {
    this.logger = deps.logger ?? consoleLogger;
  }

  async generateContent(brandId: string, postPlanId: string, runTraceId: string): Promise<GeneratedContent> {
    let text: string;
    try {
      text = await this.deps.client.run({
        runTraceId,
        phase: "copywriter",
        agentName: "copywriter-agent",
        instructions: INSTRUCTIONS,
        prompt:
          "Create an on-brand social caption for the current plan.\n" +
          `brandId: ${brandId}\npostPlanId: ${postPlanId}\n` +
          "Use the tools to fetch context as needed, then produce the final caption and hashtags.",
        tools: [getBrandTool(this.deps.brands, brandId), getPostPlanTool(this.deps.plans, { brandId, postPlanId })]
      });
    } catch (err) {
      if (err instanceof ConfigurationError) throw err;
      throw new ContentGenerationError(errorMessage(err), { agent: "copywriter-agent", cause: errorCode(err) });
    }

    const { caption, hashtags } = parseCopywriterOutput(text);
    const contentRef = (this.deps.newContentId ?? newContentId)();
    await this.deps.documents.upsert(CONTAINERS.posts, brandId, {
      id: contentRef,
      partitionKey: brandId,
      brandId,
      postPlanId,
      runTraceId,
      type: "generatedContent",
      status: "draft",
      content: { caption, hashtags }
    });
    info(this.logger, runTraceId, "posts:upsert_content", {
      docId: contentRef,
      brandId,
      postPlanId,
      captionLen: caption.length,
      hashtags: hashtags.length
    });
    return { contentRef, caption, hashtags };
  }
}
