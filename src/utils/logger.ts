import fs from "node:fs/promises";
import path from "node:path";
import { ensureDir } from "./fs.js";
import { nowIso } from "./time.js";
import type { Logger, StageLogEntry } from "../types.js";

type Level = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<Level, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface JsonlLoggerOptions {
  /** Mirror messages at or above this level to stderr. */
  echoLevel?: Level;
  write?: (line: string) => void;
}

abstract class BaseLogger implements Logger {
  abstract log(entry: StageLogEntry): Promise<void>;

  debug(stage: string, message: string): Promise<void> {
    return this.log({ ts: nowIso(), stage, event: "debug", message });
  }

  info(stage: string, message: string): Promise<void> {
    return this.log({ ts: nowIso(), stage, event: "info", message });
  }

  warn(stage: string, message: string): Promise<void> {
    return this.log({ ts: nowIso(), stage, event: "warn", message });
  }

  error(stage: string, message: string): Promise<void> {
    return this.log({ ts: nowIso(), stage, event: "error", message, error: message });
  }

  async stageStart(stage: string, inputSummary?: Record<string, unknown>): Promise<number> {
    const startedAt = Date.now();
    await this.log({
      ts: nowIso(),
      stage,
      event: "start",
      inputSummary,
    });
    return startedAt;
  }

  async stageEnd(
    stage: string,
    startedAt: number,
    counts?: Record<string, number>,
    warnings?: string[],
  ): Promise<void> {
    await this.log({
      ts: nowIso(),
      stage,
      event: "end",
      durationMs: Date.now() - startedAt,
      counts,
      warnings,
    });
  }

  async stageError(stage: string, startedAt: number, error: unknown): Promise<void> {
    await this.log({
      ts: nowIso(),
      stage,
      event: "error",
      durationMs: Date.now() - startedAt,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

export class JsonlLogger extends BaseLogger {
  private logPath: string;
  private readonly echoLevel?: Level;
  private readonly write: (line: string) => void;
  // Appends are chained so concurrent categories never interleave partial lines.
  private pending: Promise<void> = Promise.resolve();

  constructor(logPath: string, options: JsonlLoggerOptions = {}) {
    super();
    this.logPath = logPath;
    this.echoLevel = options.echoLevel;
    this.write = options.write || ((line) => process.stderr.write(line));
  }

  async init(): Promise<void> {
    await ensureDir(path.dirname(this.logPath));
    await fs.writeFile(this.logPath, "", "utf8");
  }

  async log(entry: StageLogEntry): Promise<void> {
    const payload = { ...entry, ts: entry.ts || nowIso() };
    this.echo(payload);
    const next = this.pending.then(() =>
      fs.appendFile(this.logPath, `${JSON.stringify(payload)}\n`, "utf8"),
    );
    this.pending = next.catch(() => undefined);
    await next;
  }

  private echo(entry: StageLogEntry): void {
    if (!this.echoLevel || !entry.message) return;
    if (entry.event === "start" || entry.event === "end") return;
    if (LEVEL_RANK[entry.event] < LEVEL_RANK[this.echoLevel]) return;
    this.write(`[assayer] ${entry.event}: ${entry.stage}: ${entry.message}\n`);
  }
}

/** Keeps entries in memory; used by library callers that do not want a log file. */
export class MemoryLogger extends BaseLogger {
  readonly entries: StageLogEntry[] = [];

  async log(entry: StageLogEntry): Promise<void> {
    this.entries.push({ ...entry, ts: entry.ts || nowIso() });
  }

  messages(event?: StageLogEntry["event"]): string[] {
    return this.entries
      .filter((entry) => !event || entry.event === event)
      .map((entry) => entry.message || entry.error || "");
  }
}

export function createSilentLogger(): Logger {
  return new MemoryLogger();
}
