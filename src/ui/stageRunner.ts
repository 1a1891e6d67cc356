import ora from "ora";
import { errorMessage } from "../errors.js";
import type { TerminalCapabilities } from "./capabilities.js";
import type { OutputRenderer } from "./renderer.js";
import type { AnimationScheduler } from "./scheduler.js";
import type { UiTheme } from "./theme.js";

export const STAGE_PREFIX = "[assayer]";

export interface StageEvent {
  type: "stage:start" | "stage:end" | "stage:error";
  stage: string;
  ts: number;
  durationMs?: number;
  error?: string;
}

export interface WithStageOptions {
  hint?: string;
  minStageMs?: number;
}

export interface SpinnerLike {
  text: string;
  start: () => SpinnerLike;
  succeed: (text?: string) => SpinnerLike;
  fail: (text?: string) => SpinnerLike;
}

export type SpinnerFactory = (text: string, frames: string[]) => SpinnerLike;

type BufferedLine = { text: string; kind: "ok" | "err" };

/**
 * Wraps each CLI stage in a spinner (or a plain line off-TTY). While another widget owns
 * the terminal, output is suspended and completion lines are buffered until flushed.
 */
export class StageRunner {
  private readonly listeners = new Set<(event: StageEvent) => void>();
  private readonly spinnerFactory: SpinnerFactory;
  private outputSuspended = false;
  private buffered: BufferedLine[] = [];

  constructor(
    private readonly renderer: OutputRenderer,
    private readonly scheduler: AnimationScheduler,
    private readonly capabilities: TerminalCapabilities,
    private readonly theme: UiTheme,
    spinnerFactory?: SpinnerFactory,
  ) {
    this.spinnerFactory = spinnerFactory || defaultSpinnerFactory;
  }

  onEvent(listener: (event: StageEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setOutputSuspended(suspended: boolean): void {
    this.outputSuspended = suspended;
  }

  resetRun(): void {
    this.outputSuspended = false;
    this.buffered = [];
    this.scheduler.resetRun();
  }

  flushBufferedOutput(): void {
    for (const line of this.buffered) {
      this.renderer.line(this.paint(line, true));
    }
    this.buffered = [];
  }

  async withStage<T>(stage: string, fn: () => Promise<T>, options: WithStageOptions = {}): Promise<T> {
    const startedAt = this.scheduler.timestamp();
    this.emit({ type: "stage:start", stage, ts: startedAt });

    const visible = !this.capabilities.quiet && !this.outputSuspended;
    let spinner: SpinnerLike | undefined;
    if (visible && this.capabilities.animations) {
      spinner = this.spinnerFactory(this.stageLabel(stage, options.hint), this.theme.symbols.spinnerFrames).start();
    } else if (visible) {
      this.renderer.line(`${STAGE_PREFIX} ${stage}${options.hint ? ` (${options.hint})` : ""}...`);
    }

    try {
      const result = await fn();
      const actualMs = this.scheduler.timestamp() - startedAt;
      if (spinner) {
        await this.scheduler.padStage(actualMs, options.minStageMs);
      }
      this.report(spinner, { text: `${STAGE_PREFIX} ${stage} done in ${actualMs}ms`, kind: "ok" });
      this.emit({ type: "stage:end", stage, ts: this.scheduler.timestamp(), durationMs: actualMs });
      return result;
    } catch (error) {
      const actualMs = this.scheduler.timestamp() - startedAt;
      const message = errorMessage(error);
      this.report(spinner, {
        text: `${STAGE_PREFIX} ${stage} failed in ${actualMs}ms: ${message}`,
        kind: "err",
      });
      this.emit({ type: "stage:error", stage, ts: this.scheduler.timestamp(), durationMs: actualMs, error: message });
      throw error;
    }
  }

  // The spinner draws its own success or failure mark.
  private paint(line: BufferedLine, withSymbol: boolean): string {
    const symbol = line.kind === "ok" ? this.theme.symbols.tick : this.theme.symbols.cross;
    const text = withSymbol ? `${symbol} ${line.text}` : line.text;
    return line.kind === "ok" ? this.theme.colors.ok(text) : this.theme.colors.err(text);
  }

  private report(spinner: SpinnerLike | undefined, line: BufferedLine): void {
    if (spinner) {
      if (line.kind === "ok") spinner.succeed(this.paint(line, false));
      else spinner.fail(this.paint(line, false));
    } else if (this.capabilities.quiet) {
      return;
    } else if (this.outputSuspended) {
      this.buffered.push(line);
    } else {
      this.renderer.line(this.paint(line, true));
    }
  }

  private emit(event: StageEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  private stageLabel(stage: string, hint?: string): string {
    if (!hint) {
      return `${STAGE_PREFIX} ${stage}...`;
    }
    return `${STAGE_PREFIX} ${stage}... ${this.theme.colors.dim(`(${hint})`)}`;
  }
}

function defaultSpinnerFactory(text: string, frames: string[]): SpinnerLike {
  const spinner = ora({
    text,
    spinner: { frames, interval: 80 },
    discardStdin: false,
  });

  const adapter: SpinnerLike = {
    get text() {
      return spinner.text;
    },
    set text(value: string) {
      spinner.text = value;
    },
    start: () => {
      spinner.start();
      return adapter;
    },
    succeed: (value?: string) => {
      spinner.succeed(value);
      return adapter;
    },
    fail: (value?: string) => {
      spinner.fail(value);
      return adapter;
    },
  };

  return adapter;
}
