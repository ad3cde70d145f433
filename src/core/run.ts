import type { JsonObject } from "./json.js";
import type { PhaseSummary } from "./summary.js";

export const PHASES = ["orchestrate", "copywriter", "image", "publish", "completed", "failed"] as const;
export type Phase = (typeof PHASES)[number];

/** Phases a driver actually writes; `completed`/`failed` only appear on records written elsewhere. */
export type PipelinePhase = Extract<Phase, "orchestrate" | "copywriter" | "image" | "publish">;

export const RUN_STATUSES = ["pending", "in_progress", "completed", "failed"] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

const PHASE_RANK: Record<Phase, number> = {
  orchestrate: 0,
  copywriter: 1,
  image: 2,
  publish: 3,
  completed: 4,
  failed: 4
};

export function phaseRank(phase: Phase): number {
  return PHASE_RANK[phase];
}

export function isPhaseRegression(current: Phase, next: Phase): boolean {
  return phaseRank(next) < phaseRank(current);
}

export function isRunComplete(phase: Phase, status: RunStatus): boolean {
  return phase === "publish" && status === "completed";
}

export interface RunEvent {
  ts: string;
  phase: Phase;
  action: string;
  message?: string;
  status?: RunStatus;
  data?: JsonObject;
}

export interface RunState {
  runTraceId: string;
  currentPhase: Phase;
  status: RunStatus;
  isComplete: boolean;
  brandId: string | null;
  postPlanId: string | null;
  summary: PhaseSummary | null;
  lastUpdateUtc: string;
  events: RunEvent[];
}

export function utcNow(): string {
  return new Date().toISOString();
}
