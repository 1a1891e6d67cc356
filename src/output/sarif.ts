import { severityRank } from "../assess/severity.js";
import type { AssessmentReport, Issue, Severity } from "../types.js";
import { REPOSITORY_FILE } from "../types.js";

export type SarifLevel = "error" | "warning" | "note";

export interface SarifResult {
  ruleId: string;
  level: SarifLevel;
  message: { text: string };
  locations?: Array<{
    physicalLocation: {
      artifactLocation: { uri: string };
      region?: { startLine: number; startColumn?: number };
    };
  }>;
  properties: Record<string, unknown>;
}

export interface SarifDocument {
  version: "2.1.0";
  $schema: string;
  runs: Array<{
    tool: {
      driver: {
        name: string;
        version: string;
        rules: Array<{
          id: string;
          shortDescription: { text: string };
          defaultConfiguration: { level: SarifLevel };
          properties: Record<string, unknown>;
        }>;
      };
    };
    results: SarifResult[];
    properties: Record<string, unknown>;
  }>;
}

/** One rule per tool source (`subCategory`, else the category); issues become results under it. */
export function buildIssuesSarif(report: AssessmentReport): SarifDocument {
  const issues = Object.values(report.categories).flatMap((result) => result.issues);

  const rules = new Map<string, { category: string; worst: Severity }>();
  for (const issue of issues) {
    const id = ruleIdFor(issue);
    const existing = rules.get(id);
    if (!existing) {
      rules.set(id, { category: issue.category, worst: issue.severity });
    } else if (severityRank(issue.severity) > severityRank(existing.worst)) {
      existing.worst = issue.severity;
    }
  }

  return {
    version: "2.1.0",
    $schema: "https://json.schemastore.org/sarif-2.1.0.json",
    runs: [
      {
        tool: {
          driver: {
            name: report.metadata.tool,
            version: report.metadata.version,
            rules: Array.from(rules.entries()).map(([id, rule]) => ({
              id,
              shortDescription: { text: `${rule.category} findings from ${id}` },
              defaultConfiguration: { level: severityToSarifLevel(rule.worst) },
              properties: { category: rule.category },
            })),
          },
        },
        results: issues.map(toSarifResult),
        properties: {
          generatedAt: report.metadata.generatedAt,
          target: report.metadata.target,
          overallHealth: report.summary.overallHealth,
        },
      },
    ],
  };
}

function toSarifResult(issue: Issue): SarifResult {
  const hasLocation = issue.file !== "" && issue.file !== REPOSITORY_FILE;
  return {
    ruleId: ruleIdFor(issue),
    level: severityToSarifLevel(issue.severity),
    message: { text: issue.message },
    ...(hasLocation
      ? {
          locations: [
            {
              physicalLocation: {
                artifactLocation: { uri: issue.file },
                ...(issue.line !== undefined
                  ? { region: { startLine: issue.line, ...(issue.column !== undefined ? { startColumn: issue.column } : {}) } }
                  : {}),
              },
            },
          ],
        }
      : {}),
    properties: {
      severity: issue.severity,
      category: issue.category,
      autoFixable: issue.autoFixable,
    },
  };
}

function ruleIdFor(issue: Issue): string {
  return issue.subCategory || issue.category;
}

export function severityToSarifLevel(severity: Severity): SarifLevel {
  if (severity === "critical" || severity === "high") return "error";
  if (severity === "medium") return "warning";
  return "note";
}
