import type { Phase, RunState, RunStatus } from "../core/run.js";
import type { PhaseSummary } from "../core/summary.js";
import type { RunStateStore } from "../state/runStateStore.js";

export interface TaskStatusResponse {
  runTraceId: string;
  currentPhase: Phase;
  status: RunStatus;
  isComplete: boolean;
  lastUpdateUtc: string | null;
  summary: PhaseSummary | null;
}

export function toTaskStatus(runTraceId: string, state: RunState | null): TaskStatusResponse {
  // Callers poll right after submitting, possibly before the seed write is visible.
  if (!state) {
    return {
      runTraceId,
      currentPhase: "orchestrate",
      status: "pending",
      isComplete: false,
      lastUpdateUtc: null,
      summary: null
    };
  }
  return {
    runTraceId: state.runTraceId,
    currentPhase: state.currentPhase,
    status: state.status,
    isComplete: state.isComplete,
    lastUpdateUtc: state.lastUpdateUtc,
    summary: state.summary
  };
}

export async function getTaskStatus(store: RunStateStore, runTraceId: string): Promise<TaskStatusResponse> {
  return toTaskStatus(runTraceId, await store.getStatus(runTraceId));
}

/** True for a run that is still open and has not been touched for `thresholdMs`. */
export function isStale(state: RunState, now: Date, thresholdMs: number): boolean {
  if (state.isComplete || state.status === "failed") return false;
  const last = Date.parse(state.lastUpdateUtc);
  if (Number.isNaN(last)) return true;
  return now.getTime() - last > thresholdMs;
}
