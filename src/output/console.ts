import { compareSeverity } from "../assess/severity.js";
import type { FailOnVerdict } from "../assess/failOn.js";
import type { AssessmentReport, DoctorCheck, Issue, Severity } from "../types.js";
import type { UiRuntime } from "../ui/runtime.js";
import { PANEL_WIDTH } from "../ui/renderer.js";
import { statusSymbol } from "../ui/theme.js";
import { formatDuration } from "../utils/time.js";
import { formatHealth, formatLocation } from "./markdown.js";

const TOP_ISSUES = 10;

export function topIssues(report: AssessmentReport, limit = TOP_ISSUES): Issue[] {
  return Object.values(report.categories)
    .flatMap((result) => result.issues)
    .map((issue, index) => ({ issue, index }))
    .sort((a, b) => compareSeverity(b.issue.severity, a.issue.severity) || a.index - b.index)
    .slice(0, limit)
    .map((entry) => entry.issue);
}

export function printReportSummary(ui: UiRuntime, report: AssessmentReport): void {
  const { renderer, theme } = ui;
  const { summary } = report;

  renderer.panel(
    "Assessment Summary",
    [
      `Target: ${report.metadata.target}`,
      `Health: ${formatHealth(summary.overallHealth)}   Issues: ${summary.totalIssues}   Critical: ${summary.criticalIssues}`,
      `Estimated fix time: ${formatDuration(summary.estimatedTimeMs)}   Parallel groups: ${summary.parallelGroups}`,
      `Ran in ${formatDuration(report.metadata.executionTimeMs)} with ${report.metadata.workerCount} worker(s)`,
    ],
    { width: PANEL_WIDTH },
  );

  const categories = Object.values(report.categories);
  if (categories.length > 0) {
    renderer.table(
      ["", "Category", "Priority", "Issues", "Estimate", "Duration"],
      categories.map((result) => [
        statusSymbol(theme, result.status),
        result.category,
        String(result.priority),
        String(result.issueCount),
        formatDuration(result.estimatedTimeMs),
        formatDuration(result.durationMs),
      ]),
    );
    for (const result of categories) {
      if (result.status === "error") {
        renderer.line(theme.colors.err(`${result.category}: ${result.error ?? "failed"}`));
      } else if (result.status === "skipped") {
        renderer.line(theme.colors.dim(`${result.category}: skipped (${result.skipReason ?? "no reason given"})`));
      }
    }
    renderer.line();
  }

  const top = topIssues(report);
  if (top.length > 0) {
    renderer.section("Top issues");
    renderer.bulletList(
      top.map((issue) => `${theme.severity[issue.severity](issue.severity)} ${formatLocation(issue)} ${issue.message}`),
    );
    renderer.line();
  }

  if (report.workflow.phases.length > 0) {
    renderer.section("Suggested workflow");
    renderer.bulletList(
      report.workflow.phases.map(
        (phase) =>
          `${phase.name}: ${phase.categories.join(", ")} (${formatDuration(phase.estimatedTimeMs)}) ${theme.colors.dim(phase.description)}`,
      ),
    );
    renderer.line();
  }
}

export function printFailOnVerdict(ui: UiRuntime, verdict: FailOnVerdict, failOn: Severity): void {
  const { renderer, theme } = ui;
  if (!verdict.fail) {
    renderer.line(theme.colors.ok(`${theme.symbols.tick} No failed categories and no findings at or above ${failOn}`));
    return;
  }
  renderer.line(theme.colors.err(`${theme.symbols.cross} Failing (--fail-on ${failOn}):`));
  renderer.bulletList(verdict.reasons, 2);
}

export function printDoctorChecks(ui: UiRuntime, checks: readonly DoctorCheck[]): void {
  const { renderer, theme } = ui;
  renderer.table(
    ["Tool", "Category", "Available", "Note"],
    checks.map((check) => [
      check.tool,
      check.category,
      check.available ? theme.colors.ok("yes") : theme.colors.warn("no"),
      check.note ?? "",
    ]),
  );
}
