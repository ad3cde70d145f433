import * as z from "zod/v4";
import { PHASES, RUN_STATUSES } from "../core/run.js";

const zIdentifier = z
  .string()
  .trim()
  .min(1)
  .max(256)
  .regex(/^[A-Za-z0-9][A-Za-z0-9_.:-]*$/, "identifier may only contain letters, digits and _ . : -");

export const zOrchestrateInput = z.object({
  brand_id: zIdentifier,
  post_plan_id: zIdentifier
});

export const zOrchestrateOutput = z.object({
  accepted: z.literal(true),
  runTraceId: z.string()
});

export const zCheckTaskStatusInput = z.object({
  run_trace_id: zIdentifier
});

export const zCheckTaskStatusOutput = z.object({
  runTraceId: z.string(),
  currentPhase: z.enum(PHASES),
  status: z.enum(RUN_STATUSES),
  isComplete: z.boolean(),
  lastUpdateUtc: z.string().nullable(),
  summary: z.record(z.string(), z.unknown()).nullable()
});
