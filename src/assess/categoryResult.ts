import type {
  AssessmentCategory,
  CategoryResult,
  CategoryStatus,
  Issue,
  MetricValue,
  SuppressionReport,
} from "../types.js";
import { estimateIssuesTime } from "./estimates.js";

export interface CategoryResultInput {
  category: AssessmentCategory;
  priority: number;
  issues?: Issue[];
  parallelizable: boolean;
  status: CategoryStatus;
  error?: string;
  skipReason?: string;
  durationMs?: number;
  metrics?: Record<string, MetricValue>;
  suppressionReport?: SuppressionReport;
}

/** Drops keys whose value is undefined so a report equals its own JSON round trip. */
export function compactIssue(issue: Issue): Issue {
  const compact: Issue = {
    file: issue.file,
    severity: issue.severity,
    message: issue.message,
    category: issue.category,
    autoFixable: issue.autoFixable,
  };
  if (issue.line !== undefined) compact.line = issue.line;
  if (issue.column !== undefined) compact.column = issue.column;
  if (issue.subCategory !== undefined) compact.subCategory = issue.subCategory;
  if (issue.estimatedTimeMs !== undefined) compact.estimatedTimeMs = issue.estimatedTimeMs;
  return compact;
}

/**
 * The only way results are built: counts and estimates are derived from the issues,
 * `error` survives only on error status and `skipReason` only on skipped status.
 */
export function createCategoryResult(input: CategoryResultInput): CategoryResult {
  const issues = (input.issues ?? []).map(compactIssue);
  const result: CategoryResult = {
    category: input.category,
    priority: input.priority,
    issues,
    issueCount: issues.length,
    estimatedTimeMs: estimateIssuesTime(issues),
    parallelizable: input.parallelizable,
    status: input.status,
    durationMs: Math.max(0, Math.round(input.durationMs ?? 0)),
  };

  if (input.status === "error") {
    result.error = input.error?.trim() || `${input.category} assessment failed`;
  }
  if (input.status === "skipped" && input.skipReason) {
    result.skipReason = input.skipReason;
  }
  if (input.metrics && Object.keys(input.metrics).length > 0) {
    result.metrics = { ...input.metrics };
  }
  if (input.suppressionReport) {
    result.suppressionReport = input.suppressionReport;
  }
  return Object.freeze(result);
}
