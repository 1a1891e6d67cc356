import type { Issue, Severity } from "../types.js";

export const DEFAULT_FIX_TIME_MS: Record<Severity, number> = {
  critical: 30 * 60_000,
  high: 15 * 60_000,
  medium: 5 * 60_000,
  low: 2 * 60_000,
  info: 60_000,
};

export function estimateIssueTime(issue: Issue): number {
  if (issue.estimatedTimeMs !== undefined && issue.estimatedTimeMs > 0) {
    return issue.estimatedTimeMs;
  }
  return DEFAULT_FIX_TIME_MS[issue.severity];
}

export function estimateIssuesTime(issues: readonly Issue[]): number {
  let total = 0;
  for (const issue of issues) {
    total += estimateIssueTime(issue);
  }
  return total;
}
