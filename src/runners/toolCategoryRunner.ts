import { supportsSuppressions, type AdapterContext, type AdapterDefinition } from "../adapters/types.js";
import type { AssessmentRunner } from "../assess/registry.js";
import { errorMessage } from "../errors.js";
import type {
  AssessmentCategory,
  AssessmentConfig,
  AssessmentResult,
  Issue,
  Logger,
  Suppression,
} from "../types.js";
import { commandExists } from "../utils/fs.js";
import { createSilentLogger } from "../utils/logger.js";

export type FileListProvider = (target: string, config: AssessmentConfig) => Promise<string[]>;

export interface ToolCategoryRunnerOptions {
  category: AssessmentCategory;
  definitions: AdapterDefinition[];
  parallel?: boolean;
  estimatedTimeMs?: number;
  /** Omit for runners whose tools look at the repository as a whole. */
  listFiles?: FileListProvider;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

const DEFAULT_ESTIMATE_MS = 30_000;

/**
 * Runs every available adapter of one category in turn and merges their findings.
 * One adapter failing does not drop the others' issues; the category is then an error
 * that still carries what was found.
 */
export class ToolCategoryRunner implements AssessmentRunner {
  private readonly options: ToolCategoryRunnerOptions;
  private readonly logger: Logger;

  constructor(options: ToolCategoryRunnerOptions) {
    this.options = options;
    this.logger = options.logger ?? createSilentLogger();
  }

  getCategory(): AssessmentCategory {
    return this.options.category;
  }

  canRunInParallel(): boolean {
    return this.options.parallel ?? true;
  }

  getEstimatedTime(): number {
    return this.options.estimatedTimeMs ?? DEFAULT_ESTIMATE_MS;
  }

  isAvailable(): boolean {
    return this.options.definitions.some(
      (definition) => definition.projectLocal === true || commandExists(definition.binary, this.options.env),
    );
  }

  async assess(signal: AbortSignal, target: string, config: AssessmentConfig): Promise<AssessmentResult> {
    const startedAt = Date.now();
    const category = this.options.category;
    const files = this.options.listFiles ? await this.options.listFiles(target, config) : [];
    const context: AdapterContext = {
      rootDir: target,
      files,
      mode: config.mode,
      timeoutMs: config.timeoutMs,
      env: this.options.env,
    };

    const adapters = this.options.definitions.map((definition) => definition.create(context));
    const issues: Issue[] = [];
    const suppressions: Suppression[] = [];
    const failures: string[] = [];
    const ran: string[] = [];

    for (const adapter of adapters) {
      if (!adapter.isAvailable()) {
        await this.logger.info(category, `${adapter.name} not applicable here, skipping`);
        continue;
      }
      if (signal.aborted) {
        break;
      }

      try {
        if (config.trackSuppressions && supportsSuppressions(adapter)) {
          const scan = await adapter.runWithSuppressions(signal);
          issues.push(...scan.issues);
          suppressions.push(...scan.suppressions);
        } else {
          issues.push(...(await adapter.run(signal)));
        }
        ran.push(adapter.name);
      } catch (error) {
        if (signal.aborted) {
          throw error;
        }
        const message = errorMessage(error);
        failures.push(message.startsWith(adapter.name) ? message : `${adapter.name}: ${message}`);
        await this.logger.warn(category, `${adapter.name} failed: ${message}`);
      }
    }

    return {
      commandName: category,
      category,
      success: failures.length === 0,
      executionTimeMs: Date.now() - startedAt,
      issues,
      error: failures.length > 0 ? failures.join("; ") : undefined,
      metrics: {
        adapters_run: ran.length,
        adapters: ran.join(",") || "none",
        files_considered: files.length,
      },
      suppressions: suppressions.length > 0 ? suppressions : undefined,
    };
  }
}
