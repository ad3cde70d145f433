import type { Logger } from "../core/log.js";
import { info } from "../core/log.js";
import type { RunStateStore } from "../state/runStateStore.js";

export interface JobRequest {
  brandId: string;
  postPlanId: string;
}

export interface JobAccepted {
  accepted: true;
  runTraceId: string;
}

/** Seeds a new run in `orchestrate`/`in_progress` and records that it was accepted. */
export async function seedRun(deps: { state: RunStateStore; logger: Logger }, runTraceId: string, job: JobRequest): Promise<void> {
  await deps.state.setStatus(runTraceId, "orchestrate", "in_progress", {
    summary: { kind: "orchestrate", brandId: job.brandId, postPlanId: job.postPlanId },
    brandId: job.brandId,
    postPlanId: job.postPlanId
  });
  await deps.state.addEvent(runTraceId, {
    phase: "orchestrate",
    action: "accepted",
    data: { brandId: job.brandId, postPlanId: job.postPlanId }
  });
  info(deps.logger, runTraceId, "orchestrate:accepted", { brandId: job.brandId, postPlanId: job.postPlanId });
}
