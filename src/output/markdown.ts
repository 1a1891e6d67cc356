import type { AssessmentReport, CategoryResult, Issue } from "../types.js";
import { formatDuration } from "../utils/time.js";

export interface MarkdownOptions {
  /** Issues listed per category before the rest are summarized in one line. */
  maxIssuesPerCategory?: number;
}

export const DEFAULT_MAX_ISSUES_PER_CATEGORY = 50;

export function renderReportMarkdown(report: AssessmentReport, options: MarkdownOptions = {}): string {
  const maxIssues = options.maxIssuesPerCategory ?? DEFAULT_MAX_ISSUES_PER_CATEGORY;
  const categories = Object.values(report.categories);
  const lines: string[] = [];

  lines.push("# Assessment Report");
  lines.push("");
  lines.push(renderMetadataBlock(report));
  lines.push("");

  lines.push("## Summary");
  lines.push("");
  lines.push("| Metric | Value |");
  lines.push("| --- | --- |");
  lines.push(`| Overall health | ${formatHealth(report.summary.overallHealth)} |`);
  lines.push(`| Total issues | ${report.summary.totalIssues} |`);
  lines.push(`| Critical issues | ${report.summary.criticalIssues} |`);
  lines.push(`| Categories with issues | ${report.summary.categoriesWithIssues} |`);
  lines.push(`| Estimated fix time | ${formatDuration(report.summary.estimatedTimeMs)} |`);
  lines.push(`| Parallel groups | ${report.summary.parallelGroups} |`);
  lines.push("");

  lines.push("## Categories");
  lines.push("");
  if (categories.length === 0) {
    lines.push("- No categories ran.");
  } else {
    lines.push("| Category | Priority | Status | Issues | Estimate | Duration |");
    lines.push("| --- | --- | --- | --- | --- | --- |");
    for (const result of categories) {
      lines.push(
        `| ${result.category} | ${result.priority} | ${result.status} | ${result.issueCount} | ${formatDuration(result.estimatedTimeMs)} | ${formatDuration(result.durationMs)} |`,
      );
    }
    const notes = categories.map(statusNote).filter((note): note is string => note !== null);
    if (notes.length > 0) {
      lines.push("");
      lines.push(...notes);
    }
  }
  lines.push("");

  lines.push("## Workflow");
  lines.push("");
  if (report.workflow.phases.length === 0) {
    lines.push("- Nothing to fix.");
    lines.push("");
  }
  for (const phase of report.workflow.phases) {
    lines.push(`### ${phase.name}: ${phase.description}`);
    lines.push("");
    lines.push(`- Categories: ${phase.categories.join(", ")}`);
    lines.push(`- Estimated time: ${formatDuration(phase.estimatedTimeMs)}`);
    lines.push(`- Parallel groups: ${phase.parallelGroups.length ? phase.parallelGroups.join(", ") : "none"}`);
    lines.push("");
  }

  if (report.workflow.parallelGroups.length > 0) {
    lines.push("## Parallel Groups");
    lines.push("");
    lines.push("| Group | Files | Categories | Issues | Estimate |");
    lines.push("| --- | --- | --- | --- | --- |");
    for (const group of report.workflow.parallelGroups) {
      const files = group.files.length ? group.files.map((file) => `\`${escapeTable(file)}\``).join(", ") : "-";
      lines.push(
        `| ${group.name} | ${files} | ${group.categories.join(", ")} | ${group.issueCount} | ${formatDuration(group.estimatedTimeMs)} |`,
      );
    }
    lines.push("");
  }

  const withIssues = categories.filter((result) => result.issues.length > 0);
  if (withIssues.length > 0) {
    lines.push("## Issues");
    lines.push("");
    for (const result of withIssues) {
      lines.push(`### ${result.category} (${result.issues.length})`);
      lines.push("");
      for (const issue of result.issues.slice(0, maxIssues)) {
        lines.push(`- ${renderIssueLine(issue)}`);
      }
      if (result.issues.length > maxIssues) {
        lines.push(`- ... and ${result.issues.length - maxIssues} more`);
      }
      lines.push("");
    }
  }

  const suppressed = categories.filter((result) => result.suppressionReport);
  if (suppressed.length > 0) {
    lines.push("## Suppressions");
    lines.push("");
    for (const result of suppressed) {
      const summary = result.suppressionReport?.summary;
      if (!summary) continue;
      lines.push(`- ${result.category}: ${summary.total} total (${summary.withReason} with reason, ${summary.withoutReason} without)`);
      for (const rule of summary.topRules) {
        lines.push(`  - ${rule.name}: ${rule.count}`);
      }
    }
    lines.push("");
  }

  return `${lines.join("\n").trimEnd()}\n`;
}

export function renderIssueLine(issue: Issue): string {
  const fix = issue.autoFixable ? " (auto-fixable)" : "";
  return `\`${formatLocation(issue)}\` **${issue.severity}** ${issue.message.replace(/\s*\n\s*/g, " ")}${fix}`;
}

export function formatLocation(issue: Pick<Issue, "file" | "line" | "column">): string {
  let location = issue.file || "(no file)";
  if (issue.line !== undefined) {
    location += `:${issue.line}`;
    if (issue.column !== undefined) location += `:${issue.column}`;
  }
  return location;
}

export function formatHealth(health: number): string {
  return `${Math.round(health * 100)}%`;
}

function statusNote(result: CategoryResult): string | null {
  if (result.status === "error") return `- **${result.category}** failed: ${result.error ?? "unknown error"}`;
  if (result.status === "skipped") return `- **${result.category}** skipped: ${result.skipReason ?? "no reason given"}`;
  return null;
}

function renderMetadataBlock(report: AssessmentReport): string {
  const { metadata } = report;
  return [
    "```yaml",
    `generated_at: ${metadata.generatedAt}`,
    `target: ${metadata.target}`,
    `tool_version: ${metadata.tool} ${metadata.version}`,
    `worker_count: ${metadata.workerCount}`,
    `execution_time: ${formatDuration(metadata.executionTimeMs)}`,
    ...(metadata.failOn ? [`fail_on: ${metadata.failOn}`] : []),
    "```",
  ].join("\n");
}

function escapeTable(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\n/g, " ").trim();
}
