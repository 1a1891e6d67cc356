import { validateTimeouts } from "../config/assessConfig.js";
import { ConfigError, ToolExecutionError, errorMessage } from "../errors.js";
import type {
  AssessmentCategory,
  AssessmentConfig,
  AssessmentReport,
  AssessmentResult,
  CategoryResult,
  ExtendedWorkplan,
  Logger,
} from "../types.js";
import { isAssessmentCategory } from "../types.js";
import { createSilentLogger } from "../utils/logger.js";
import { formatDuration, nowIso } from "../utils/time.js";
import { TOOL_NAME, TOOL_VERSION } from "../version.js";
import { createCategoryResult } from "./categoryResult.js";
import { PriorityManager } from "./priorities.js";
import type { AssessmentRunner, RunnerRegistry } from "./registry.js";
import { calculateSummary, validateHealthWeights } from "./summary.js";
import { buildSuppressionReport } from "./suppressions.js";
import { resolveWorkerCount, runPool } from "./workerPool.js";
import { generateWorkflow } from "./workflow.js";

export type EngineEvent =
  | { type: "planned"; categories: AssessmentCategory[]; workerCount: number }
  | { type: "start"; category: AssessmentCategory }
  | { type: "end"; category: AssessmentCategory; result: CategoryResult };

export interface AssessmentEngineOptions {
  registry: RunnerRegistry;
  logger?: Logger;
  cpuCount?: number;
  onEvent?: (event: EngineEvent) => void;
}

class CategoryTimeoutError extends Error {
  constructor(category: AssessmentCategory, timeoutMs: number) {
    super(`${category} assessment timed out after ${formatDuration(timeoutMs)}`);
    this.name = "CategoryTimeoutError";
  }
}

interface CategoryRun {
  result: CategoryResult;
  commandName?: string;
}

function abortReasonText(reason: unknown): string {
  if (reason instanceof Error && reason.name !== "AbortError") return reason.message;
  if (typeof reason === "string" && reason) return reason;
  return "run cancelled";
}

/** Rejects as soon as `signal` aborts, even when `work` never settles. */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    void work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

export class AssessmentEngine {
  private readonly registry: RunnerRegistry;
  private readonly logger: Logger;
  private readonly cpuCount?: number;
  private readonly onEvent?: (event: EngineEvent) => void;

  constructor(options: AssessmentEngineOptions) {
    this.registry = options.registry;
    this.logger = options.logger ?? createSilentLogger();
    this.cpuCount = options.cpuCount;
    this.onEvent = options.onEvent;
  }

  async runAssessment(target: string, config: AssessmentConfig, signal?: AbortSignal): Promise<AssessmentReport> {
    const startedAt = await this.logger.stageStart("assess", { target, mode: config.mode });

    const priorities = new PriorityManager();
    try {
      priorities.parsePriorityString(config.priorityString);
    } catch (error) {
      throw new ConfigError(errorMessage(error));
    }
    const problems = [
      ...validateHealthWeights(config.healthWeights).map((problem) => `healthWeights: ${problem}`),
      ...validateTimeouts(config),
    ];
    if (problems.length > 0) {
      throw new ConfigError(problems.join("; "));
    }

    const skipReasons: Record<string, string> = {};
    const available = new Set(this.registry.getAvailableCategories());
    for (const category of this.registry.getAllCategories()) {
      if (!available.has(category)) {
        skipReasons[category] = "tool not available";
        await this.logger.info("assess", `${category}: runner not available, skipping`);
      }
    }

    let selected = Array.from(available);
    if (config.selectedCategories.length > 0) {
      const wanted = new Set(config.selectedCategories);
      selected = selected.filter((category) => wanted.has(category));
      for (const name of config.selectedCategories) {
        if (isAssessmentCategory(name) && this.registry.getRunner(name).found) continue;
        skipReasons[name] = "no runner registered";
        await this.logger.info("assess", `${name}: no runner registered, skipping`);
      }
      for (const category of available) {
        if (!wanted.has(category)) skipReasons[category] = "not selected";
      }
    }
    const ordered = priorities.orderCategories(selected);

    const workerCount = resolveWorkerCount({
      concurrency: config.concurrency,
      concurrencyPercent: config.concurrencyPercent,
      cpuCount: this.cpuCount,
    });
    const estimatedMs = ordered.reduce(
      (sum, category) => sum + (this.registry.getRunner(category).runner?.getEstimatedTime(target) ?? 0),
      0,
    );
    await this.logger.info(
      "assess",
      `running ${ordered.length} categories with ${workerCount} worker(s): ${ordered.join(", ") || "none"} (estimated ${formatDuration(estimatedMs)} serial)`,
    );
    this.onEvent?.({ type: "planned", categories: ordered, workerCount });

    const runController = new AbortController();
    const forwardAbort = (): void => runController.abort(signal?.reason);
    if (signal?.aborted) {
      forwardAbort();
    } else {
      signal?.addEventListener("abort", forwardAbort, { once: true });
    }
    let totalTimer: NodeJS.Timeout | undefined;
    if (config.totalTimeoutMs > 0) {
      totalTimer = setTimeout(() => {
        runController.abort(new Error(`total timeout of ${formatDuration(config.totalTimeoutMs)} exceeded`));
      }, config.totalTimeoutMs);
    }

    const runs = new Map<AssessmentCategory, CategoryRun>();
    try {
      const outcomes = await runPool(
        ordered.map((category) => {
          const { runner } = this.registry.getRunner(category);
          return {
            key: category,
            exclusive: runner ? !runner.canRunInParallel() : false,
            run: () => this.runCategory(category, runner, priorities.getPriority(category), target, config, runController.signal),
          };
        }),
        { workers: workerCount, signal: runController.signal },
      );

      for (const [index, outcome] of outcomes.entries()) {
        const category = ordered[index];
        const priority = priorities.getPriority(category);
        const parallelizable = this.registry.getRunner(category).runner?.canRunInParallel() ?? true;
        if (!outcome.started) {
          const reason = `run cancelled before start: ${abortReasonText(runController.signal.reason)}`;
          const result = createCategoryResult({ category, priority, parallelizable, status: "skipped", skipReason: reason });
          runs.set(category, { result });
          this.onEvent?.({ type: "end", category, result });
        } else if (outcome.ok) {
          runs.set(category, outcome.value);
        } else {
          runs.set(category, {
            result: createCategoryResult({ category, priority, parallelizable, status: "error", error: errorMessage(outcome.error) }),
          });
        }
      }
    } finally {
      if (totalTimer) clearTimeout(totalTimer);
      signal?.removeEventListener("abort", forwardAbort);
    }

    const categories: Record<string, CategoryResult> = {};
    const commandsRun: string[] = [];
    const categoryRuntimesMs: Record<string, number> = {};
    for (const category of ordered) {
      const run = runs.get(category);
      if (!run) continue;
      categories[category] = run.result;
      categoryRuntimesMs[category] = run.result.durationMs;
      if (run.commandName) commandsRun.push(run.commandName);
      if (run.result.status === "skipped" && run.result.skipReason) {
        skipReasons[category] = run.result.skipReason;
      }
    }

    const workflow = generateWorkflow(categories);
    const summary = calculateSummary(categories, workflow, config.healthWeights);
    const executionTimeMs = Date.now() - startedAt;

    const report: AssessmentReport = {
      metadata: {
        generatedAt: nowIso(),
        tool: TOOL_NAME,
        version: TOOL_VERSION,
        target,
        executionTimeMs,
        commandsRun,
        workerCount,
        failOn: config.failOn,
      },
      summary,
      categories,
      workflow,
    };

    if (config.extended) {
      report.workplan = this.buildWorkplan(ordered, categories, skipReasons, workerCount, categoryRuntimesMs, executionTimeMs, config);
    }

    await this.logger.stageEnd("assess", startedAt, {
      categories: ordered.length,
      issues: summary.totalIssues,
      workers: workerCount,
    });
    return report;
  }

  private buildWorkplan(
    planned: AssessmentCategory[],
    categories: Record<string, CategoryResult>,
    skipReasons: Record<string, string>,
    workerCount: number,
    categoryRuntimesMs: Record<string, number>,
    totalRuntimeMs: number,
    config: AssessmentConfig,
  ): ExtendedWorkplan {
    const skipped = Object.keys(skipReasons)
      .filter(isAssessmentCategory)
      .filter((category) => this.registry.getRunner(category).found);
    return {
      categoriesPlanned: planned.filter((category) => categories[category]?.status !== "skipped"),
      categoriesSkipped: skipped,
      skipReasons: { ...skipReasons },
      workerCount,
      categoryRuntimesMs,
      totalRuntimeMs,
      includePatterns: [...config.includeFiles],
      excludePatterns: [...config.excludeFiles],
    };
  }

  private async runCategory(
    category: AssessmentCategory,
    runner: AssessmentRunner | undefined,
    priority: number,
    target: string,
    config: AssessmentConfig,
    runSignal: AbortSignal,
  ): Promise<CategoryRun> {
    const parallelizable = runner ? runner.canRunInParallel() : true;
    if (!runner) {
      return {
        result: createCategoryResult({ category, priority, parallelizable, status: "error", error: `no runner registered for ${category}` }),
      };
    }

    this.onEvent?.({ type: "start", category });
    const stage = `assess:${category}`;
    const startedAt = await this.logger.stageStart(stage, { priority, parallelizable });

    const controller = new AbortController();
    const onRunAbort = (): void => controller.abort(runSignal.reason);
    if (runSignal.aborted) {
      onRunAbort();
    } else {
      runSignal.addEventListener("abort", onRunAbort, { once: true });
    }
    let timer: NodeJS.Timeout | undefined;
    if (config.timeoutMs > 0) {
      timer = setTimeout(() => controller.abort(new CategoryTimeoutError(category, config.timeoutMs)), config.timeoutMs);
    }

    let run: CategoryRun;
    try {
      const outcome = await raceAbort(runner.assess(controller.signal, target, config), controller.signal);
      if (controller.signal.aborted) {
        run = { result: this.abortedResult(category, priority, parallelizable, controller.signal.reason, startedAt), commandName: outcome.commandName };
      } else {
        run = { result: this.resultFromOutcome(category, outcome, priority, parallelizable, config, startedAt), commandName: outcome.commandName };
      }
    } catch (error) {
      if (controller.signal.aborted) {
        run = { result: this.abortedResult(category, priority, parallelizable, controller.signal.reason, startedAt) };
      } else {
        run = {
          result: createCategoryResult({
            category,
            priority,
            parallelizable,
            status: "error",
            error: error instanceof ToolExecutionError ? `${error.tool}: ${error.message}` : errorMessage(error),
            durationMs: Date.now() - startedAt,
          }),
        };
      }
    } finally {
      if (timer) clearTimeout(timer);
      runSignal.removeEventListener("abort", onRunAbort);
    }

    if (run.result.status === "error") {
      await this.logger.stageError(stage, startedAt, run.result.error);
    } else {
      await this.logger.stageEnd(stage, startedAt, { issues: run.result.issueCount });
    }
    this.onEvent?.({ type: "end", category, result: run.result });
    return run;
  }

  private abortedResult(
    category: AssessmentCategory,
    priority: number,
    parallelizable: boolean,
    reason: unknown,
    startedAt: number,
  ): CategoryResult {
    const error =
      reason instanceof CategoryTimeoutError
        ? reason.message
        : `${category} assessment cancelled: ${abortReasonText(reason)}`;
    return createCategoryResult({
      category,
      priority,
      parallelizable,
      status: "error",
      error,
      durationMs: Date.now() - startedAt,
    });
  }

  private resultFromOutcome(
    category: AssessmentCategory,
    outcome: AssessmentResult,
    priority: number,
    parallelizable: boolean,
    config: AssessmentConfig,
    startedAt: number,
  ): CategoryResult {
    const durationMs = Date.now() - startedAt;
    const suppressionReport =
      config.trackSuppressions && outcome.suppressions && outcome.suppressions.length > 0
        ? buildSuppressionReport(outcome.suppressions)
        : undefined;

    if (outcome.success) {
      return createCategoryResult({
        category,
        priority,
        issues: outcome.issues,
        parallelizable,
        status: "success",
        durationMs,
        metrics: outcome.metrics,
        suppressionReport,
      });
    }
    if (outcome.error) {
      return createCategoryResult({
        category,
        priority,
        issues: outcome.issues,
        parallelizable,
        status: "error",
        error: outcome.error,
        durationMs,
        metrics: outcome.metrics,
      });
    }
    return createCategoryResult({
      category,
      priority,
      parallelizable,
      status: "skipped",
      skipReason: `${outcome.commandName} reported no result`,
      durationMs,
      metrics: outcome.metrics,
    });
  }
}
