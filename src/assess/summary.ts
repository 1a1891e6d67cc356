import { SEVERITIES, type CategoryResult, type HealthWeights, type ReportSummary, type WorkflowPlan } from "../types.js";

export const DEFAULT_HEALTH_WEIGHTS: Readonly<HealthWeights> = Object.freeze({
  critical: 0.1,
  high: 0.05,
  medium: 0.02,
  low: 0.01,
  info: 0.005,
});

/** Returns the problems with a weight table; empty means usable. */
export function validateHealthWeights(weights: HealthWeights): string[] {
  const problems: string[] = [];
  for (const severity of SEVERITIES) {
    const value = weights[severity];
    if (!Number.isFinite(value) || value < 0) {
      problems.push(`${severity} weight must be a non-negative number`);
    }
  }
  // SEVERITIES runs info -> critical, so each weight must be >= the one before it.
  for (let i = 1; i < SEVERITIES.length; i += 1) {
    const lower = SEVERITIES[i - 1];
    const higher = SEVERITIES[i];
    if (weights[higher] < weights[lower]) {
      problems.push(`${higher} weight must be at least the ${lower} weight`);
    }
  }
  return problems;
}

export function calculateHealth(
  categories: Iterable<CategoryResult>,
  weights: HealthWeights = DEFAULT_HEALTH_WEIGHTS,
): number {
  let penalty = 0;
  for (const result of categories) {
    for (const issue of result.issues) {
      penalty += weights[issue.severity];
    }
  }
  return Math.min(1, Math.max(0, 1 - penalty));
}

export function calculateSummary(
  categories: Record<string, CategoryResult>,
  plan: WorkflowPlan,
  weights: HealthWeights = DEFAULT_HEALTH_WEIGHTS,
): ReportSummary {
  const results = Object.values(categories);
  let totalIssues = 0;
  let criticalIssues = 0;
  let categoriesWithIssues = 0;

  for (const result of results) {
    totalIssues += result.issueCount;
    if (result.issueCount > 0) categoriesWithIssues += 1;
    for (const issue of result.issues) {
      if (issue.severity === "critical") criticalIssues += 1;
    }
  }

  return {
    overallHealth: calculateHealth(results, weights),
    criticalIssues,
    totalIssues,
    estimatedTimeMs: plan.totalTimeMs,
    categoriesWithIssues,
    parallelGroups: plan.parallelGroups.length,
  };
}
