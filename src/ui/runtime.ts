import { CategoryBoard } from "./categoryBoard.js";
import { detectTerminalCapabilities, type CapabilityOverrides, type TerminalCapabilities } from "./capabilities.js";
import { OutputRenderer } from "./renderer.js";
import { AnimationScheduler } from "./scheduler.js";
import { StageRunner } from "./stageRunner.js";
import { createTheme, type UiTheme } from "./theme.js";

export interface UiRuntime {
  capabilities: TerminalCapabilities;
  theme: UiTheme;
  scheduler: AnimationScheduler;
  renderer: OutputRenderer;
  stageRunner: StageRunner;
  createBoard(): CategoryBoard;
}

export type UiOptions = Pick<CapabilityOverrides, "quiet" | "animation">;

let runtime: UiRuntime | undefined;
let options: UiOptions = {};

/** CLI flags land here before the first render; later calls rebuild the runtime. */
export function configureUi(next: UiOptions): void {
  options = { ...options, ...next };
  runtime = undefined;
}

export function getUiRuntime(): UiRuntime {
  if (runtime) {
    return runtime;
  }
  runtime = createUiRuntime(detectTerminalCapabilities(options));
  return runtime;
}

export function createUiRuntime(capabilities: TerminalCapabilities, write?: (text: string) => void): UiRuntime {
  const theme = createTheme(capabilities);
  const scheduler = new AnimationScheduler({ reducedMotion: !capabilities.animations });
  const renderer = new OutputRenderer(capabilities, theme, { write });
  const stageRunner = new StageRunner(renderer, scheduler, capabilities, theme);
  return {
    capabilities,
    theme,
    scheduler,
    renderer,
    stageRunner,
    createBoard: () => new CategoryBoard(renderer, capabilities, theme),
  };
}
