import type { DocumentBrandLoader } from "../collaborators/documentRepositories.js";
import type { PlanLoader } from "../collaborators/types.js";
import type { AgentTool } from "./agentClient.js";

export interface ToolResult {
  status: "completed" | "failed";
  result?: unknown;
  error?: { code: string; message: string };
}

export function stringArg(args: Record<string, unknown>, ...names: string[]): string | null {
  for (const n of names) {
    const v = args[n];
    if (typeof v === "string" && v.trim()) return v.trim();
  }
  return null;
}

export function invalidArgs(message: string): ToolResult {
  return { status: "failed", error: { code: "invalid_args", message } };
}

export function getBrandTool(brands: DocumentBrandLoader, defaultBrandId: string): AgentTool {
  return {
    definition: {
      name: "get_brand",
      description: "Fetch the brand document (voice, style, social accounts) for a brand id.",
      parameters: {
        type: "object",
        properties: { brandId: { type: "string" } },
        required: ["brandId"]
      }
    },
    handler: async (args): Promise<ToolResult> => {
      const brandId = stringArg(args, "brandId", "brand_id") ?? defaultBrandId;
      const brand = await brands.loadBrand(brandId);
      if (!brand) return { status: "failed", error: { code: "not_found", message: `Brand with id ${brandId} not found.` } };
      return { status: "completed", result: brand };
    }
  };
}

export function getPostPlanTool(plans: PlanLoader, defaults: { brandId: string; postPlanId: string }): AgentTool {
  return {
    definition: {
      name: "get_post_plan",
      description: "Fetch the post plan brief (topics, hashtags, platforms, media type).",
      parameters: {
        type: "object",
        properties: { brandId: { type: "string" }, postPlanId: { type: "string" } },
        required: ["postPlanId"]
      }
    },
    handler: async (args): Promise<ToolResult> => {
      const brandId = stringArg(args, "brandId", "brand_id") ?? defaults.brandId;
      const postPlanId = stringArg(args, "postPlanId", "post_plan_id") ?? defaults.postPlanId;
      if (!postPlanId) return invalidArgs("postPlanId required");
      const plan = await plans.loadPostPlan(brandId, postPlanId);
      if (!plan) return { status: "failed", error: { code: "not_found", message: `Post plan with id ${postPlanId} not found.` } };
      return { status: "completed", result: plan };
    }
  };
}
