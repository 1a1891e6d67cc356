import cliCursor from "cli-cursor";
import type { EngineEvent } from "../assess/engine.js";
import type { AssessmentCategory, CategoryResult } from "../types.js";
import { formatDuration } from "../utils/time.js";
import type { TerminalCapabilities } from "./capabilities.js";
import { pad, type OutputRenderer } from "./renderer.js";
import { statusSymbol, type UiTheme } from "./theme.js";

export type BoardState = "pending" | "running" | CategoryResult["status"];

export interface BoardEntry {
  category: AssessmentCategory;
  state: BoardState;
  issues?: number;
  durationMs?: number;
  detail?: string;
}

const NAME_WIDTH = 16;
const FRAME_MS = 100;

export function renderBoardLine(entry: BoardEntry, theme: UiTheme, frame = 0): string {
  const name = pad(entry.category, NAME_WIDTH);
  switch (entry.state) {
    case "pending":
      return `${theme.colors.dim(theme.symbols.pending)} ${name} ${theme.colors.dim("waiting")}`;
    case "running": {
      const frames = theme.symbols.spinnerFrames;
      return `${theme.colors.primary(frames[frame % frames.length] ?? "")} ${name} running`;
    }
    case "success":
      return `${statusSymbol(theme, "success")} ${name} ${entry.issues ?? 0} issue(s) in ${formatDuration(entry.durationMs ?? 0)}`;
    case "error":
      return `${statusSymbol(theme, "error")} ${name} ${theme.colors.err(`error: ${entry.detail ?? "failed"}`)}`;
    case "skipped":
      return `${statusSymbol(theme, "skipped")} ${name} ${theme.colors.dim(`skipped: ${entry.detail ?? "not run"}`)}`;
  }
}

export function renderBoard(entries: readonly BoardEntry[], workerCount: number, theme: UiTheme, frame = 0): string {
  const done = entries.filter((entry) => entry.state !== "pending" && entry.state !== "running").length;
  const header = theme.colors.heading(
    `Assessing ${entries.length} categories with ${workerCount} worker(s) [${done}/${entries.length}]`,
  );
  return [header, ...entries.map((entry) => renderBoardLine(entry, theme, frame))].join("\n");
}

/**
 * Live per-category status fed by engine events. On an interactive terminal it redraws in
 * place; otherwise it prints one line as each category finishes.
 */
export class CategoryBoard {
  private entries: BoardEntry[] = [];
  private workerCount = 1;
  private frame = 0;
  private ticker: NodeJS.Timeout | undefined;
  private cursorHidden = false;

  constructor(
    private readonly renderer: OutputRenderer,
    private readonly capabilities: TerminalCapabilities,
    private readonly theme: UiTheme,
  ) {}

  get live(): boolean {
    return this.capabilities.animations && !this.capabilities.quiet;
  }

  snapshot(): BoardEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  readonly handleEvent = (event: EngineEvent): void => {
    if (event.type === "planned") {
      this.entries = event.categories.map((category) => ({ category, state: "pending" }));
      this.workerCount = event.workerCount;
      this.start();
      return;
    }

    const entry = this.entries.find((candidate) => candidate.category === event.category);
    if (!entry) return;

    if (event.type === "start") {
      entry.state = "running";
    } else {
      this.finish(entry, event.result);
    }
    this.draw();
  };

  stop(): void {
    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = undefined;
    }
    if (this.live && this.entries.length > 0) {
      this.renderer.liveUpdate(renderBoard(this.entries, this.workerCount, this.theme, this.frame));
      this.renderer.liveDone();
    }
    if (this.cursorHidden) {
      cliCursor.show();
      this.cursorHidden = false;
    }
  }

  private start(): void {
    if (this.capabilities.quiet) return;
    if (!this.live) {
      this.renderer.line(
        `Assessing ${this.entries.length} categories with ${this.workerCount} worker(s): ${this.entries.map((entry) => entry.category).join(", ") || "none"}`,
      );
      return;
    }
    cliCursor.hide();
    this.cursorHidden = true;
    this.ticker = setInterval(() => {
      this.frame += 1;
      this.draw();
    }, FRAME_MS);
    // The ticker alone must not keep the process alive after a run.
    this.ticker.unref();
    this.draw();
  }

  private finish(entry: BoardEntry, result: CategoryResult): void {
    entry.state = result.status;
    entry.issues = result.issueCount;
    entry.durationMs = result.durationMs;
    entry.detail = result.status === "error" ? result.error : result.skipReason;
    if (!this.live && !this.capabilities.quiet) {
      this.renderer.line(renderBoardLine(entry, this.theme));
    }
  }

  private draw(): void {
    if (!this.live) return;
    this.renderer.liveUpdate(renderBoard(this.entries, this.workerCount, this.theme, this.frame));
  }
}
