export type LogLevel = "info" | "warn" | "error";

export interface LogRecord {
  ts: string;
  level: LogLevel;
  event: string;
  runTraceId?: string;
  [dimension: string]: unknown;
}

export interface Logger {
  log(level: LogLevel, runTraceId: string | null, event: string, dimensions?: Record<string, unknown>): void;
}

// stdout belongs to the MCP stdio transport, so records go to stderr.
export const consoleLogger: Logger = {
  log(level, runTraceId, event, dimensions = {}) {
    const record: LogRecord = { ts: new Date().toISOString(), level, event, ...dimensions };
    if (runTraceId) record.runTraceId = runTraceId;
    console.error(JSON.stringify(record));
  }
};

export class MemoryLogger implements Logger {
  readonly records: LogRecord[] = [];

  log(level: LogLevel, runTraceId: string | null, event: string, dimensions: Record<string, unknown> = {}): void {
    const record: LogRecord = { ts: new Date().toISOString(), level, event, ...dimensions };
    if (runTraceId) record.runTraceId = runTraceId;
    this.records.push(record);
  }

  events(level?: LogLevel): string[] {
    return this.records.filter((r) => !level || r.level === level).map((r) => r.event);
  }
}

export function info(logger: Logger, runTraceId: string | null, event: string, dimensions?: Record<string, unknown>): void {
  logger.log("info", runTraceId, event, dimensions);
}

export function warn(logger: Logger, runTraceId: string | null, event: string, dimensions?: Record<string, unknown>): void {
  logger.log("warn", runTraceId, event, dimensions);
}

export function error(logger: Logger, runTraceId: string | null, event: string, dimensions?: Record<string, unknown>): void {
  logger.log("error", runTraceId, event, dimensions);
}
