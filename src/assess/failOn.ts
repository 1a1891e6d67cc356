import type { AssessmentReport, Severity } from "../types.js";
import { isAtLeast, severityRank } from "./severity.js";

export const EXIT_OK = 0;
export const EXIT_FAIL_ON = 1;
export const EXIT_CONFIG_ERROR = 2;

export function highestSeverity(report: AssessmentReport): Severity | null {
  let highest: Severity | null = null;
  for (const result of Object.values(report.categories)) {
    for (const issue of result.issues) {
      if (highest === null || severityRank(issue.severity) > severityRank(highest)) {
        highest = issue.severity;
      }
    }
  }
  return highest;
}

export interface FailOnVerdict {
  fail: boolean;
  reasons: string[];
}

/** Read-only over the report; the verdict is never written back into it. */
export function evaluateFailOn(report: AssessmentReport, failOn: Severity): FailOnVerdict {
  const reasons: string[] = [];
  for (const [name, result] of Object.entries(report.categories)) {
    if (result.status === "error") {
      reasons.push(`${name}: ${result.error ?? "assessment failed"}`);
    }
    const over = result.issues.filter((issue) => isAtLeast(issue.severity, failOn)).length;
    if (over > 0) {
      reasons.push(`${name}: ${over} issue(s) at or above ${failOn}`);
    }
  }
  return { fail: reasons.length > 0, reasons };
}

export function shouldFail(report: AssessmentReport, failOn: Severity): boolean {
  return evaluateFailOn(report, failOn).fail;
}
