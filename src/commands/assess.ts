import path from "node:path";
import { AssessmentEngine } from "../assess/engine.js";
import { EXIT_FAIL_ON, EXIT_OK, evaluateFailOn } from "../assess/failOn.js";
import { parseSeverity } from "../assess/severity.js";
import type { RunnerRegistry } from "../assess/registry.js";
import { CONFIG_DIR, parseDurationOption, resolveAssessmentConfig } from "../config/assessConfig.js";
import { ConfigError } from "../errors.js";
import { printFailOnVerdict, printReportSummary } from "../output/console.js";
import { parseReportFormats, writeReportArtifacts } from "../output/writer.js";
import { createDefaultRegistry } from "../runners/defaults.js";
import {
  ASSESSMENT_MODES,
  type AssessmentConfig,
  type AssessmentMode,
  type AssessmentReport,
  type Logger,
} from "../types.js";
import { configureUi, getUiRuntime, type UiRuntime } from "../ui/runtime.js";
import { isDirectory } from "../utils/fs.js";
import { JsonlLogger } from "../utils/logger.js";
import { timestampForPath } from "../utils/time.js";

export interface AssessCliOptions {
  categories?: string;
  mode?: string;
  fix?: boolean;
  format?: string;
  out?: string;
  failOn?: string;
  concurrency?: string;
  concurrencyPercent?: string;
  timeout?: string;
  totalTimeout?: string;
  include?: string;
  exclude?: string;
  /** `false` when `--no-ignore` is given. */
  ignore?: boolean;
  priority?: string;
  trackSuppressions?: boolean;
  extended?: boolean;
  config?: string;
  /** `false` when `--no-animation` is given. */
  animation?: boolean;
  verbose?: boolean;
}

export function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function parseMode(value: string): AssessmentMode {
  const mode = ASSESSMENT_MODES.find((candidate) => candidate === value.trim().toLowerCase());
  if (!mode) {
    throw new ConfigError(`--mode: unknown mode "${value}" (expected ${ASSESSMENT_MODES.join(", ")})`);
  }
  return mode;
}

function parseIntegerOption(value: string, flag: string, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new ConfigError(`${flag}: expected an integer between ${min} and ${max}, got "${value}"`);
  }
  return parsed;
}

/** Only flags the user actually gave become overrides; everything else comes from the config file. */
export function buildConfigOverrides(cli: AssessCliOptions): Partial<AssessmentConfig> {
  const overrides: Partial<AssessmentConfig> = {};

  if (cli.fix) {
    overrides.mode = "fix";
  } else if (cli.mode !== undefined) {
    overrides.mode = parseMode(cli.mode);
  }
  if (cli.failOn !== undefined) {
    const severity = parseSeverity(cli.failOn);
    if (!severity) {
      throw new ConfigError(`--fail-on: unknown severity "${cli.failOn}" (expected info, low, medium, high, critical)`);
    }
    overrides.failOn = severity;
  }
  if (cli.concurrency !== undefined) {
    overrides.concurrency = parseIntegerOption(cli.concurrency, "--concurrency", 0);
  }
  if (cli.concurrencyPercent !== undefined) {
    overrides.concurrencyPercent = parseIntegerOption(cli.concurrencyPercent, "--concurrency-percent", 1, 100);
  }
  if (cli.timeout !== undefined) {
    overrides.timeoutMs = parseDurationOption(cli.timeout, "--timeout");
  }
  if (cli.totalTimeout !== undefined) {
    overrides.totalTimeoutMs = parseDurationOption(cli.totalTimeout, "--total-timeout");
  }
  overrides.selectedCategories = splitList(cli.categories);
  overrides.includeFiles = splitList(cli.include);
  overrides.excludeFiles = splitList(cli.exclude);
  if (cli.ignore === false) overrides.noIgnore = true;
  if (cli.priority !== undefined) overrides.priorityString = cli.priority;
  if (cli.trackSuppressions) overrides.trackSuppressions = true;
  if (cli.extended) overrides.extended = true;
  if (cli.verbose) overrides.verbose = true;

  return overrides;
}

export async function resolveTargetDir(target: string | undefined, cwd = process.cwd()): Promise<string> {
  const resolved = path.resolve(cwd, target ?? ".");
  if (!(await isDirectory(resolved))) {
    throw new ConfigError(`target is not a directory: ${resolved}`);
  }
  return resolved;
}

export function defaultOutputDir(targetDir: string, date = new Date()): string {
  return path.join(targetDir, CONFIG_DIR, "reports", timestampForPath(date));
}

export interface RunAssessmentInput {
  targetDir: string;
  config: AssessmentConfig;
  ui: UiRuntime;
  logger: Logger;
  registry?: RunnerRegistry;
  signal?: AbortSignal;
}

/** Runs the engine with the live board attached; shared by `assess` and in-process hook commands. */
export async function runAssessmentWithBoard(input: RunAssessmentInput): Promise<AssessmentReport> {
  const board = input.ui.createBoard();
  const engine = new AssessmentEngine({
    registry: input.registry ?? createDefaultRegistry({ logger: input.logger }),
    logger: input.logger,
    onEvent: board.handleEvent,
  });

  input.ui.stageRunner.setOutputSuspended(true);
  try {
    return await engine.runAssessment(input.targetDir, input.config, input.signal);
  } finally {
    board.stop();
    input.ui.stageRunner.setOutputSuspended(false);
    input.ui.stageRunner.flushBufferedOutput();
  }
}

/** Interrupts abort the run instead of killing the process, so partial results are still written. */
export function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSignal = (name: NodeJS.Signals): void => controller.abort(new Error(`interrupted by ${name}`));
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    },
  };
}

export async function assessCommand(target: string | undefined, cli: AssessCliOptions): Promise<number> {
  configureUi({ animation: cli.animation });
  const ui = getUiRuntime();
  ui.stageRunner.resetRun();

  const targetDir = await resolveTargetDir(target);
  const formats = parseReportFormats(cli.format ?? "md,json");
  const overrides = buildConfigOverrides(cli);
  const config = await ui.stageRunner.withStage("Loading configuration", () =>
    resolveAssessmentConfig({ rootDir: targetDir, configPath: cli.config, overrides }),
  );

  const outputDir = cli.out ? path.resolve(cli.out) : defaultOutputDir(targetDir);
  const logger = new JsonlLogger(path.join(outputDir, "logs.jsonl"), {
    echoLevel: config.verbose ? "info" : undefined,
  });
  await logger.init();

  const interrupt = interruptSignal();
  let report: AssessmentReport;
  try {
    report = await runAssessmentWithBoard({ targetDir, config, ui, logger, signal: interrupt.signal });
  } finally {
    interrupt.dispose();
  }

  const written = await ui.stageRunner.withStage("Writing reports", () => writeReportArtifacts(outputDir, report, formats), {
    hint: formats.join(", "),
  });
  await logger.info("output", `wrote ${written.join(", ")}`);

  printReportSummary(ui, report);
  ui.renderer.line(`Reports: ${outputDir}`);

  const verdict = evaluateFailOn(report, config.failOn);
  printFailOnVerdict(ui, verdict, config.failOn);
  return verdict.fail ? EXIT_FAIL_ON : EXIT_OK;
}
