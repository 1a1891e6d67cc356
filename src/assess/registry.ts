import type { AssessmentCategory, AssessmentConfig, AssessmentResult } from "../types.js";

export interface AssessmentRunner {
  /** Runs the assessment; must stop work promptly once `signal` aborts. */
  assess(signal: AbortSignal, target: string, config: AssessmentConfig): Promise<AssessmentResult>;
  canRunInParallel(): boolean;
  getCategory(): AssessmentCategory;
  getEstimatedTime(target: string): number;
  /** PATH lookup or file check only; runs before scheduling. */
  isAvailable(): boolean;
}

export interface RunnerLookup {
  runner: AssessmentRunner | undefined;
  found: boolean;
}

export class RunnerRegistry {
  private readonly runners = new Map<AssessmentCategory, AssessmentRunner>();

  /** Re-registering a category replaces the previous runner. */
  registerRunner(category: AssessmentCategory, runner: AssessmentRunner): void {
    this.runners.set(category, runner);
  }

  getRunner(category: AssessmentCategory): RunnerLookup {
    const runner = this.runners.get(category);
    return { runner, found: runner !== undefined };
  }

  getAvailableCategories(): AssessmentCategory[] {
    const categories: AssessmentCategory[] = [];
    for (const [category, runner] of this.runners) {
      if (runner.isAvailable()) {
        categories.push(category);
      }
    }
    return categories;
  }

  getAllCategories(): AssessmentCategory[] {
    return Array.from(this.runners.keys());
  }

  get size(): number {
    return this.runners.size;
  }
}

let defaultRegistry = new RunnerRegistry();

export function getDefaultRegistry(): RunnerRegistry {
  return defaultRegistry;
}

export function registerAssessmentRunner(category: AssessmentCategory, runner: AssessmentRunner): void {
  defaultRegistry.registerRunner(category, runner);
}

/** Swaps in a fresh default registry and returns the previous one so it can be restored. */
export function resetDefaultRegistryForTesting(): RunnerRegistry {
  const previous = defaultRegistry;
  defaultRegistry = new RunnerRegistry();
  return previous;
}

export function restoreDefaultRegistry(saved: RunnerRegistry): void {
  defaultRegistry = saved;
}
