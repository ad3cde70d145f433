import * as z from "zod/v4";
import { errorMessage } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";
import type { Logger } from "../core/log.js";
import { consoleLogger, info, warn } from "../core/log.js";
import type { Phase, RunEvent, RunState, RunStatus } from "../core/run.js";
import { PHASES, RUN_STATUSES, isPhaseRegression, isRunComplete, utcNow } from "../core/run.js";
import type { PhaseSummary } from "../core/summary.js";
import { parsePhaseSummary } from "../core/summary.js";
import { KeyedMutex } from "../store/keyedMutex.js";

/** Outcome of a state write. Writes never throw; callers may inspect or ignore this. */
export type TelemetryResult = { ok: true } | { ok: false; error: string };

export interface SetStatusOptions {
  summary?: PhaseSummary | null;
  brandId?: string;
  postPlanId?: string;
}

export interface NewRunEvent {
  phase: Phase;
  action: string;
  message?: string;
  status?: RunStatus;
  data?: JsonObject;
}

export interface RunStateStore {
  setStatus(runTraceId: string, phase: Phase, status: RunStatus, options?: SetStatusOptions): Promise<TelemetryResult>;
  getStatus(runTraceId: string): Promise<RunState | null>;
  addEvent(runTraceId: string, event: NewRunEvent): Promise<TelemetryResult>;
}

const zStoredEvent = z.object({
  ts: z.string(),
  phase: z.enum(PHASES),
  action: z.string(),
  message: z.string().optional(),
  status: z.enum(RUN_STATUSES).optional(),
  data: z.record(z.string(), z.unknown()).optional()
});

const zStoredRunState = z.object({
  runTraceId: z.string().min(1),
  currentPhase: z.enum(PHASES),
  status: z.enum(RUN_STATUSES),
  brandId: z.string().nullish(),
  postPlanId: z.string().nullish(),
  summary: z.unknown().optional(),
  lastUpdateUtc: z.string(),
  events: z.array(zStoredEvent).nullish()
});

/** Decodes a persisted record; `isComplete` is always recomputed from phase and status. */
export function decodeRunState(raw: unknown): RunState | null {
  const parsed = zStoredRunState.safeParse(raw);
  if (!parsed.success) return null;
  const r = parsed.data;
  return {
    runTraceId: r.runTraceId,
    currentPhase: r.currentPhase,
    status: r.status,
    isComplete: isRunComplete(r.currentPhase, r.status),
    brandId: r.brandId ?? null,
    postPlanId: r.postPlanId ?? null,
    summary: parsePhaseSummary(r.summary),
    lastUpdateUtc: r.lastUpdateUtc,
    events: r.events ?? []
  };
}

export function encodeRunState(state: RunState): JsonObject {
  return {
    runTraceId: state.runTraceId,
    currentPhase: state.currentPhase,
    status: state.status,
    isComplete: state.isComplete,
    brandId: state.brandId,
    postPlanId: state.postPlanId,
    summary: state.summary,
    lastUpdateUtc: state.lastUpdateUtc,
    events: state.events
  };
}

export type ApplyStatusResult = { ok: true; state: RunState } | { ok: false; error: string };

export function applyStatus(
  existing: RunState | null,
  runTraceId: string,
  phase: Phase,
  status: RunStatus,
  options: SetStatusOptions,
  now: string
): ApplyStatusResult {
  if (existing && isPhaseRegression(existing.currentPhase, phase)) {
    return { ok: false, error: `phase regression ${existing.currentPhase} -> ${phase} refused` };
  }
  return {
    ok: true,
    state: {
      runTraceId,
      currentPhase: phase,
      status,
      isComplete: isRunComplete(phase, status),
      brandId: options.brandId ?? existing?.brandId ?? null,
      postPlanId: options.postPlanId ?? existing?.postPlanId ?? null,
      summary: options.summary ?? null,
      lastUpdateUtc: now,
      events: existing?.events ?? []
    }
  };
}

export function applyEvent(existing: RunState | null, runTraceId: string, event: NewRunEvent, now: string): RunState {
  const status = event.status ?? "in_progress";
  const base: RunState = existing ?? {
    runTraceId,
    currentPhase: event.phase,
    status,
    isComplete: isRunComplete(event.phase, status),
    brandId: null,
    postPlanId: null,
    summary: null,
    lastUpdateUtc: now,
    events: []
  };

  const ev: RunEvent = { ts: now, phase: event.phase, action: event.action };
  if (event.message) ev.message = event.message;
  if (event.status) ev.status = event.status;
  if (event.data !== undefined) ev.data = event.data;

  return { ...base, events: [...base.events, ev], lastUpdateUtc: now };
}

/**
 * Shared read-then-write cycle for the concrete backends. Subclasses supply record IO;
 * this class serialises writers per lock key and turns failures into TelemetryResults.
 */
export abstract class BaseRunStateStore implements RunStateStore {
  private readonly mutex = new KeyedMutex();

  protected constructor(
    protected readonly logger: Logger = consoleLogger,
    private readonly clock: () => string = utcNow
  ) {}

  protected abstract readonly backendName: string;
  protected abstract readRecord(runTraceId: string): Promise<RunState | null>;
  protected abstract writeRecord(state: RunState): Promise<void>;

  protected lockKey(runTraceId: string): string {
    return runTraceId;
  }

  /** Wraps one read-modify-write cycle; the remote backend retries it. */
  protected mutate(op: () => Promise<TelemetryResult>): Promise<TelemetryResult> {
    return op();
  }

  async setStatus(runTraceId: string, phase: Phase, status: RunStatus, options: SetStatusOptions = {}): Promise<TelemetryResult> {
    try {
      return await this.mutex.runExclusive(this.lockKey(runTraceId), () =>
        this.mutate(async () => {
          const existing = await this.readRecord(runTraceId);
          const next = applyStatus(existing, runTraceId, phase, status, options, this.clock());
          if (!next.ok) {
            warn(this.logger, runTraceId, "run_state:phase_regression_refused", { backend: this.backendName, phase, status });
            return next;
          }
          await this.writeRecord(next.state);
          info(this.logger, runTraceId, "run_state:set_status", { backend: this.backendName, phase, status });
          return { ok: true };
        })
      );
    } catch (e) {
      warn(this.logger, runTraceId, "run_state:set_status_failed", { backend: this.backendName, phase, status, error: errorMessage(e) });
      return { ok: false, error: errorMessage(e) };
    }
  }

  async addEvent(runTraceId: string, event: NewRunEvent): Promise<TelemetryResult> {
    try {
      return await this.mutex.runExclusive(this.lockKey(runTraceId), () =>
        this.mutate(async () => {
          const existing = await this.readRecord(runTraceId);
          await this.writeRecord(applyEvent(existing, runTraceId, event, this.clock()));
          return { ok: true };
        })
      );
    } catch (e) {
      warn(this.logger, runTraceId, "run_state:add_event_failed", {
        backend: this.backendName,
        phase: event.phase,
        action: event.action,
        error: errorMessage(e)
      });
      return { ok: false, error: errorMessage(e) };
    }
  }

  /** Null only when no record exists; a failed read is logged and re-thrown. */
  async getStatus(runTraceId: string): Promise<RunState | null> {
    try {
      return await this.readRecord(runTraceId);
    } catch (e) {
      warn(this.logger, runTraceId, "run_state:read_failed", { backend: this.backendName, error: errorMessage(e) });
      throw e;
    }
  }
}
