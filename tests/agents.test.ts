import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { pathToFileURL } from "url";

import { AgentRunClient } from "../src/agents/agentClient.js";
import { AgentContentGenerator, parseCopywriterOutput } from "../src/agents/contentAgent.js";
import { AgentImageGenerator, PlaceholderImageGenerator, parseImageOutput } from "../src/agents/imageAgent.js";
import {
  ImageSearchClient,
  WebImageImporter,
  extensionFor,
  persistImageFromUrlTool,
  searchImagesTool
} from "../src/agents/imageTools.js";
import { CONTAINERS, DocumentBrandLoader, DocumentPlanLoader } from "../src/collaborators/documentRepositories.js";
import { ContentGenerationError, MediaGenerationError } from "../src/core/errors.js";
import { MemoryLogger } from "../src/core/log.js";
import { renderPlaceholderSvg } from "../src/execution/fallback.js";
import { LocalMediaStore } from "../src/media/localMediaStore.js";
import { MemoryDocumentStore, jsonResponse, noSleep, scriptedAgentFetch } from "./helpers.js";

describe("parseCopywriterOutput", () => {
  it("splits the caption from hashtag lines", () => {
    expect(parseCopywriterOutput("Fresh roast today\n#coffee #morning\n#local")).toEqual({
      caption: "Fresh roast today",
      hashtags: ["#coffee", "#morning", "#local"]
    });
  });

  it("keeps multi-line text without hashtags as the caption", () => {
    expect(parseCopywriterOutput("  Line one\nLine two  ")).toEqual({ caption: "Line one\nLine two", hashtags: [] });
  });

  it("handles text that is only hashtags", () => {
    expect(parseCopywriterOutput("#coffee")).toEqual({ caption: "#coffee", hashtags: [] });
  });
});

describe("parseImageOutput", () => {
  it("reads a JSON reply", () => {
    expect(parseImageOutput('{"mediaRef":"m1","url":"https://cdn.example/m1.png"}')).toEqual({
      mediaRef: "m1",
      url: "https://cdn.example/m1.png"
    });
  });

  it("reads a reply nested under result", () => {
    expect(parseImageOutput('{"status":"completed","result":{"mediaRef":"m2","url":"https://cdn.example/m2.png"}}')).toEqual({
      mediaRef: "m2",
      url: "https://cdn.example/m2.png"
    });
  });

  it("reads key: value lines", () => {
    expect(parseImageOutput('mediaRef: "m3"\nurl: https://cdn.example/m3.png')).toEqual({
      mediaRef: "m3",
      url: "https://cdn.example/m3.png"
    });
  });

  it("returns nulls for an unusable reply", () => {
    expect(parseImageOutput("I could not find an image.")).toEqual({ mediaRef: null, url: null });
  });
});

describe("agent-backed generators", () => {
  let tmpDir: string;
  let documents: MemoryDocumentStore;
  let logger: MemoryLogger;
  let placeholder: PlaceholderImageGenerator;
  let media: LocalMediaStore;

  function clientReplying(reply: string): AgentRunClient {
    const agent = scriptedAgentFetch({ reply });
    return new AgentRunClient({
      endpoint: "http://agents.test",
      apiKey: "test-secret",
      model: "test-model",
      fetch: agent.fetch,
      sleep: noSleep,
      logger
    });
  }

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "content-relay-agents-"));
    documents = new MemoryDocumentStore();
    logger = new MemoryLogger();
    media = new LocalMediaStore(tmpDir);
    placeholder = new PlaceholderImageGenerator({ media, documents, logger });
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("stores generated copy as a draft content document", async () => {
    const generator = new AgentContentGenerator({
      client: clientReplying("Fresh roast today\n#coffee"),
      documents,
      brands: new DocumentBrandLoader(documents),
      plans: new DocumentPlanLoader(documents),
      logger,
      newContentId: () => "content-fixed"
    });

    const out = await generator.generateContent("brand-1", "plan-1", "run_1");

    expect(out).toEqual({ contentRef: "content-fixed", caption: "Fresh roast today", hashtags: ["#coffee"] });
    expect(await documents.readItem(CONTAINERS.posts, "content-fixed", "brand-1")).toEqual({
      id: "content-fixed",
      partitionKey: "brand-1",
      brandId: "brand-1",
      postPlanId: "plan-1",
      runTraceId: "run_1",
      type: "generatedContent",
      status: "draft",
      content: { caption: "Fresh roast today", hashtags: ["#coffee"] }
    });
  });

  it("renders and records a placeholder image", async () => {
    const out = await placeholder.generateImage("brand-1", "plan-1", "run_1", "Fresh roast today");

    expect(out.provider).toBe("placeholder");
    expect(out.mediaRef).toMatch(/^media-[0-9a-f]{16}$/);
    expect(out.url).toBe(pathToFileURL(path.join(tmpDir, `${out.mediaRef}.svg`)).href);
    expect((await media.read(`media/${out.mediaRef}.svg`)).toString("utf8")).toBe(renderPlaceholderSvg("Fresh roast today"));

    const doc = await documents.readItem(CONTAINERS.media, out.mediaRef, "brand-1");
    expect(doc).toMatchObject({ type: "generatedMedia", runTraceId: "run_1", media: { format: "svg", provider: "placeholder" } });
  });

  it("uses the image the agent returns", async () => {
    const generator = new AgentImageGenerator({
      client: clientReplying('{"mediaRef":"m1","url":"https://cdn.example/m1.png"}'),
      brands: new DocumentBrandLoader(documents),
      plans: new DocumentPlanLoader(documents),
      placeholder,
      importer: new WebImageImporter({ media, documents, logger })
    });

    expect(await generator.generateImage("brand-1", "plan-1", "run_1", "caption")).toEqual({
      mediaRef: "m1",
      url: "https://cdn.example/m1.png",
      provider: "agent"
    });
    expect(documents.docs.size).toBe(0);
  });

  it("falls back to the placeholder when the agent reply has no image", async () => {
    const generator = new AgentImageGenerator({
      client: clientReplying("No suitable image."),
      brands: new DocumentBrandLoader(documents),
      plans: new DocumentPlanLoader(documents),
      placeholder,
      importer: new WebImageImporter({ media, documents, logger })
    });

    const out = await generator.generateImage("brand-1", "plan-1", "run_1", "Fresh roast today");
    expect(out.provider).toBe("placeholder");
    const svg = await readFile(path.join(tmpDir, `${out.mediaRef}.svg`), "utf8");
    expect(svg).toContain(">Fresh roast today</text>");
  });
});

describe("agent failures", () => {
  function failingClient(): AgentRunClient {
    const agent = scriptedAgentFetch({
      reply: "",
      runStatuses: [{ id: "run_a", status: "failed", last_error: { code: "rate_limited" } }]
    });
    return new AgentRunClient({
      endpoint: "http://agents.test",
      apiKey: null,
      model: null,
      fetch: agent.fetch,
      sleep: noSleep,
      logger: new MemoryLogger()
    });
  }

  it("reports a failed copywriter run as a content generation error", async () => {
    const documents = new MemoryDocumentStore();
    const generator = new AgentContentGenerator({
      client: failingClient(),
      documents,
      brands: new DocumentBrandLoader(documents),
      plans: new DocumentPlanLoader(documents),
      logger: new MemoryLogger()
    });

    const attempt = generator.generateContent("brand-1", "plan-1", "run_1");
    await expect(attempt).rejects.toBeInstanceOf(ContentGenerationError);
    await expect(attempt).rejects.toThrow('Agent run failed: {"code":"rate_limited"}');
    expect(documents.docs.size).toBe(0);
  });

  it("reports a failed image run as a media generation error", async () => {
    const documents = new MemoryDocumentStore();
    const media = new LocalMediaStore(path.join(os.tmpdir(), "content-relay-unused"));
    const generator = new AgentImageGenerator({
      client: failingClient(),
      brands: new DocumentBrandLoader(documents),
      plans: new DocumentPlanLoader(documents),
      placeholder: new PlaceholderImageGenerator({ media, documents }),
      importer: new WebImageImporter({ media, documents })
    });

    await expect(generator.generateImage("brand-1", "plan-1", "run_1", "caption")).rejects.toBeInstanceOf(MediaGenerationError);
  });
});

describe("image tools", () => {
  const owner = { brandId: "brand-1", postPlanId: "plan-1", runTraceId: "run_1" };
  let tmpDir: string;
  let documents: MemoryDocumentStore;
  let media: LocalMediaStore;
  let downloads: string[];

  function importerServing(response: () => Response): WebImageImporter {
    return new WebImageImporter({
      media,
      documents,
      logger: new MemoryLogger(),
      fetch: async (input) => {
        downloads.push(input);
        return response();
      }
    });
  }

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "content-relay-image-tools-"));
    documents = new MemoryDocumentStore();
    media = new LocalMediaStore(tmpDir);
    downloads = [];
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("maps content types to file extensions", () => {
    expect(extensionFor("image/png")).toBe("png");
    expect(extensionFor("image/jpeg")).toBe("jpg");
    expect(extensionFor("application/octet-stream")).toBe("bin");
  });

  it("searches for candidate images with the configured key and filters", async () => {
    const calls: Array<{ url: string; key: string | null }> = [];
    const search = new ImageSearchClient({
      endpoint: "https://images.test/search",
      apiKey: "test-secret",
      safeSearch: "Strict",
      fetch: async (input, init) => {
        calls.push({ url: input, key: new Headers(init?.headers).get("ocp-apim-subscription-key") });
        return jsonResponse({
          value: [
            {
              contentUrl: "https://cdn.test/a.png",
              thumbnailUrl: "https://cdn.test/a-thumb.png",
              name: "Latte art",
              hostPageUrl: "https://blog.test/latte",
              width: 1200,
              height: 800,
              encodingFormat: "png",
              provider: [{ name: "Blog" }],
              insightsMetadata: { imageLicense: "Public" }
            },
            { name: "no content url" }
          ]
        });
      }
    });
    const tool = searchImagesTool(search);

    const result = await tool.handler({ query: "latte art", count: 3 });

    expect(result).toEqual({
      status: "completed",
      result: {
        items: [
          {
            url: "https://cdn.test/a.png",
            thumbnail: "https://cdn.test/a-thumb.png",
            title: "Latte art",
            hostPage: "https://blog.test/latte",
            width: 1200,
            height: 800,
            encodingFormat: "png",
            provider: "Blog",
            license: "Public"
          }
        ]
      }
    });
    expect(calls).toHaveLength(1);
    const sent = new URL(calls[0]?.url ?? "https://invalid.test");
    expect(sent.origin + sent.pathname).toBe("https://images.test/search");
    expect(sent.searchParams.get("q")).toBe("latte art");
    expect(sent.searchParams.get("count")).toBe("3");
    expect(sent.searchParams.get("safeSearch")).toBe("Strict");
    expect(sent.searchParams.get("license")).toBeNull();
    expect(calls[0]?.key).toBe("test-secret");
    expect(tool.eventData?.({ query: "latte art" }, result)).toEqual({ query: "latte art", count: 1 });
  });

  it("requires a search query", async () => {
    const search = new ImageSearchClient({ endpoint: "https://images.test/search", apiKey: null, fetch: async () => jsonResponse({}) });
    expect(await searchImagesTool(search).handler({})).toEqual({
      status: "failed",
      error: { code: "invalid_args", message: "query is required" }
    });
  });

  it("downloads an image url and records its source", async () => {
    const importer = importerServing(
      () => new Response("fake-png-bytes", { status: 200, headers: { "Content-Type": "image/png; charset=binary" } })
    );
    const tool = persistImageFromUrlTool(importer, owner);

    const result = await tool.handler({ url: "https://cdn.test/a.png", title: "Latte art", license: "Public", width: 1200 });

    expect(result).toMatchObject({ status: "completed", result: { provider: "web" } });
    expect(downloads).toEqual(["https://cdn.test/a.png"]);
    const doc = [...documents.docs.values()].find((d) => d.container === CONTAINERS.media)?.body;
    expect(doc).toMatchObject({
      partitionKey: "brand-1",
      type: "generatedMedia",
      brandId: "brand-1",
      postPlanId: "plan-1",
      runTraceId: "run_1",
      media: {
        format: "png",
        provider: "web",
        meta: {
          sourceUrl: "https://cdn.test/a.png",
          size: 14,
          format: "png",
          license: "Public",
          title: "Latte art",
          hostPage: null,
          width: 1200,
          height: null
        }
      }
    });
    const mediaId = String(doc?.id);
    expect(mediaId).toMatch(/^media-[0-9a-f]{16}$/);
    expect((await media.read(`media/${mediaId}.png`)).toString("utf8")).toBe("fake-png-bytes");
  });

  it("reports a failed download to the agent", async () => {
    const tool = persistImageFromUrlTool(
      importerServing(() => new Response("gone", { status: 404 })),
      owner
    );

    expect(await tool.handler({ url: "https://cdn.test/missing.png" })).toEqual({
      status: "failed",
      error: { code: "download_failed", message: "download failed with HTTP 404" }
    });
    expect(documents.docs.size).toBe(0);
  });

  it("refuses urls that are not http or https", async () => {
    const tool = persistImageFromUrlTool(
      importerServing(() => new Response("")),
      owner
    );

    expect(await tool.handler({ url: "file:///etc/hosts" })).toEqual({
      status: "failed",
      error: { code: "invalid_args", message: "url must be http or https" }
    });
    expect(downloads).toEqual([]);
  });

  it("offers search and url import to the image agent", async () => {
    const agent = scriptedAgentFetch({ reply: '{"mediaRef":"m1","url":"https://cdn.example/m1.png"}' });
    const logger = new MemoryLogger();
    const generator = new AgentImageGenerator({
      client: new AgentRunClient({
        endpoint: "http://agents.test",
        apiKey: "test-secret",
        model: "test-model",
        fetch: agent.fetch,
        sleep: noSleep,
        logger
      }),
      brands: new DocumentBrandLoader(documents),
      plans: new DocumentPlanLoader(documents),
      placeholder: new PlaceholderImageGenerator({ media, documents, logger }),
      importer: importerServing(() => new Response("")),
      search: new ImageSearchClient({ endpoint: "https://images.test/search", apiKey: null, fetch: async () => jsonResponse({}) })
    });

    await generator.generateImage("brand-1", "plan-1", "run_1", "caption");

    expect(agent.requests[2]?.body).toMatchObject({
      agent: {
        tools: [
          { function: { name: "get_brand" } },
          { function: { name: "get_post_plan" } },
          { function: { name: "search_images" } },
          { function: { name: "persist_image_from_url" } },
          { function: { name: "generate_image_from_prompt" } }
        ]
      }
    });
  });
});

describe("local media store", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "content-relay-media-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("returns absolute file urls under a relative root", async () => {
    const store = new LocalMediaStore(path.relative(process.cwd(), tmpDir));
    const stored = await store.putBytes({
      name: "card.svg",
      bytes: Buffer.from("<svg/>", "utf8"),
      contentType: "image/svg+xml",
      extension: "svg"
    });

    expect(stored.url).toBe(pathToFileURL(path.join(tmpDir, "card.svg")).href);
    expect(stored.mediaRef).toBe("media/card.svg");
  });
});
