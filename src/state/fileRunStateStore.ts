import { randomBytes } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import type { Logger } from "../core/log.js";
import { consoleLogger, warn } from "../core/log.js";
import type { RunState } from "../core/run.js";
import { isJsonObject } from "../core/json.js";
import { BaseRunStateStore, decodeRunState, encodeRunState } from "./runStateStore.js";

export const STATE_FILE_NAME = "state.json";

/** All runs share one JSON map on disk, so every write holds the same lock. */
export class FileRunStateStore extends BaseRunStateStore {
  protected readonly backendName = "file";
  private readonly filePath: string;

  constructor(
    private readonly dir: string,
    logger: Logger = consoleLogger,
    clock?: () => string
  ) {
    super(logger, clock);
    this.filePath = path.join(dir, STATE_FILE_NAME);
  }

  protected override lockKey(): string {
    return this.filePath;
  }

  private async readAll(): Promise<Record<string, unknown>> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf8");
    } catch (e) {
      if (isJsonObject(e) && e.code === "ENOENT") return {};
      throw e;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      if (isJsonObject(parsed)) return parsed;
    } catch (e) {
      warn(this.logger, null, "run_state:file_unreadable", { path: this.filePath, error: String(e) });
      return {};
    }
    warn(this.logger, null, "run_state:file_unreadable", { path: this.filePath, error: "not a JSON object" });
    return {};
  }

  private async writeAll(data: Record<string, unknown>): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(data), "utf8");
    await fs.rename(tmp, this.filePath);
  }

  protected async readRecord(runTraceId: string): Promise<RunState | null> {
    const all = await this.readAll();
    const raw = all[runTraceId];
    return raw === undefined ? null : decodeRunState(raw);
  }

  protected async writeRecord(state: RunState): Promise<void> {
    const all = await this.readAll();
    all[state.runTraceId] = encodeRunState(state);
    await this.writeAll(all);
  }
}
