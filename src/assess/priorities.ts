import { ASSESSMENT_CATEGORIES, type AssessmentCategory } from "../types.js";

export const DEFAULT_PRIORITIES: Readonly<Partial<Record<AssessmentCategory, number>>> = {
  format: 1,
  security: 2,
  "static-analysis": 3,
  lint: 4,
  performance: 5,
};

export const UNKNOWN_PRIORITY = 999;

const PRIORITY_WORDS = new Map<string, number>([
  ["1", 1],
  ["highest", 1],
  ["2", 2],
  ["high", 2],
  ["3", 3],
  ["medium", 3],
  ["4", 4],
  ["low", 4],
  ["5", 5],
  ["lowest", 5],
]);

const PRIORITY_DESCRIPTIONS = new Map<number, string>([
  [1, "Quick wins, often auto-fixable"],
  [2, "Critical issues that may block progress"],
  [3, "Code correctness and potential bugs"],
  [4, "Code quality improvements"],
  [5, "Optimization opportunities"],
]);

export class PriorityManager {
  private readonly custom = new Map<AssessmentCategory, number>();

  setCustomPriority(category: AssessmentCategory, priority: number): void {
    this.custom.set(category, priority);
  }

  clearCustomPriority(category: AssessmentCategory): void {
    this.custom.delete(category);
  }

  getPriority(category: AssessmentCategory): number {
    return this.custom.get(category) ?? DEFAULT_PRIORITIES[category] ?? UNKNOWN_PRIORITY;
  }

  /** Ascending priority; equal priorities fall back to category name. */
  orderCategories(categories: readonly AssessmentCategory[]): AssessmentCategory[] {
    return [...categories].sort((a, b) => {
      const diff = this.getPriority(a) - this.getPriority(b);
      return diff !== 0 ? diff : a.localeCompare(b);
    });
  }

  /**
   * Applies overrides such as "security=1,format=high,lint=default".
   * `default` drops an earlier override for that category.
   */
  parsePriorityString(value: string): void {
    if (!value.trim()) {
      return;
    }

    let validEntries = 0;
    for (const rawPart of value.split(",")) {
      const part = rawPart.trim();
      if (!part) continue;

      const eq = part.indexOf("=");
      if (eq === -1) {
        throw new Error(`invalid priority format: ${part} (expected category=priority)`);
      }
      const name = part.slice(0, eq).trim();
      const level = part.slice(eq + 1).trim().toLowerCase();
      const category = ASSESSMENT_CATEGORIES.find((candidate) => candidate === name);
      if (!category) {
        throw new Error(`unknown assessment category in priority string: ${name}`);
      }

      if (level === "default") {
        this.clearCustomPriority(category);
        validEntries += 1;
        continue;
      }

      const priority = PRIORITY_WORDS.get(level);
      if (priority === undefined) {
        throw new Error(`invalid priority value: ${level} (expected 1-5 or highest/lowest)`);
      }
      this.setCustomPriority(category, priority);
      validEntries += 1;
    }

    if (validEntries === 0) {
      throw new Error(`no valid priority entries found in: ${value}`);
    }
  }

  describe(category: AssessmentCategory): string {
    return PRIORITY_DESCRIPTIONS.get(this.getPriority(category)) ?? "Remaining issues";
  }
}

export function describePriority(priority: number): string {
  return PRIORITY_DESCRIPTIONS.get(priority) ?? "Remaining issues";
}
