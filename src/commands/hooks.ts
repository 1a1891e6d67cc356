import path from "node:path";
import { evaluateFailOn, EXIT_OK } from "../assess/failOn.js";
import { HookExecutor, type InternalCommandHandler } from "../assess/hookExecutor.js";
import { resolveAssessmentConfig } from "../config/assessConfig.js";
import { hookCommands, loadHooksManifest } from "../config/hooksManifest.js";
import { printFailOnVerdict, printReportSummary } from "../output/console.js";
import type { Logger } from "../types.js";
import { configureUi, getUiRuntime, type UiRuntime } from "../ui/runtime.js";
import { JsonlLogger } from "../utils/logger.js";
import { defaultOutputDir, interruptSignal, resolveTargetDir, runAssessmentWithBoard } from "./assess.js";

export interface HooksCliOptions {
  manifest?: string;
  config?: string;
  animation?: boolean;
  verbose?: boolean;
}

const CATEGORY_COMMANDS = new Set(["format", "lint", "security", "dependencies"]);

/**
 * Runs internal hook commands in this process: `validate` only resolves the configuration,
 * `assess` runs every category and the others run the category of the same name.
 */
export function createInternalHandler(input: {
  targetDir: string;
  configPath?: string;
  ui: UiRuntime;
  logger: Logger;
}): InternalCommandHandler {
  return async (signal, command, args) => {
    const config = await resolveAssessmentConfig({ rootDir: input.targetDir, configPath: input.configPath });
    if (command === "validate") {
      await input.logger.info("hooks", "configuration is valid");
      return;
    }

    const selected = CATEGORY_COMMANDS.has(command) ? [command] : config.selectedCategories;
    const mode = args.includes("--fix") ? "fix" : config.mode;
    const report = await runAssessmentWithBoard({
      targetDir: input.targetDir,
      config: { ...config, selectedCategories: selected, mode },
      ui: input.ui,
      logger: input.logger,
      signal,
    });
    printReportSummary(input.ui, report);

    const verdict = evaluateFailOn(report, config.failOn);
    printFailOnVerdict(input.ui, verdict, config.failOn);
    if (verdict.fail) {
      throw new Error(verdict.reasons.join("; "));
    }
  };
}

export async function hooksRunCommand(hook: string, target: string | undefined, cli: HooksCliOptions): Promise<number> {
  configureUi({ animation: cli.animation });
  const ui = getUiRuntime();
  ui.stageRunner.resetRun();

  const targetDir = await resolveTargetDir(target);
  const manifest = await loadHooksManifest(targetDir, cli.manifest);
  const commands = hookCommands(manifest, hook);

  const logger = new JsonlLogger(path.join(defaultOutputDir(targetDir), "logs.jsonl"), {
    echoLevel: cli.verbose ? "info" : "warn",
  });
  await logger.init();

  const executor = new HookExecutor({
    workDir: targetDir,
    verbose: cli.verbose,
    logger,
    internalHandler: createInternalHandler({ targetDir, configPath: cli.config, ui, logger }),
  });

  const interrupt = interruptSignal();
  try {
    await executor.executeHookCommands(commands, interrupt.signal);
  } finally {
    interrupt.dispose();
  }
  ui.renderer.line(ui.theme.colors.ok(`${ui.theme.symbols.tick} hook ${hook}: ${commands.length} command(s) passed`));
  return EXIT_OK;
}
