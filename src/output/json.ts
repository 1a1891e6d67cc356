import { z } from "zod";
import { ReportParseError } from "../errors.js";
import { ASSESSMENT_CATEGORIES, SEVERITIES, type AssessmentReport } from "../types.js";

const SeveritySchema = z.enum(SEVERITIES);
const CategorySchema = z.enum(ASSESSMENT_CATEGORIES);
const CountSchema = z.number().int().nonnegative();
const MillisSchema = z.number().nonnegative();

const IssueSchema = z.object({
  file: z.string(),
  line: z.number().int().optional(),
  column: z.number().int().optional(),
  severity: SeveritySchema,
  message: z.string(),
  category: CategorySchema,
  subCategory: z.string().optional(),
  autoFixable: z.boolean(),
  estimatedTimeMs: MillisSchema.optional(),
});

const SuppressionSchema = z.object({
  tool: z.string(),
  ruleId: z.string().optional(),
  file: z.string(),
  line: z.number().int(),
  syntax: z.string(),
  reason: z.string().optional(),
});

const TopItemSchema = z.object({ name: z.string(), count: CountSchema });

const SuppressionReportSchema = z.object({
  suppressions: z.array(SuppressionSchema),
  summary: z.object({
    total: CountSchema,
    byTool: z.record(CountSchema),
    byRule: z.record(CountSchema),
    byFile: z.record(CountSchema),
    topRules: z.array(TopItemSchema),
    topFiles: z.array(TopItemSchema),
    withReason: CountSchema,
    withoutReason: CountSchema,
  }),
});

const CategoryResultSchema = z.object({
  category: CategorySchema,
  priority: z.number().int(),
  issues: z.array(IssueSchema),
  issueCount: CountSchema,
  estimatedTimeMs: MillisSchema,
  parallelizable: z.boolean(),
  status: z.enum(["success", "error", "skipped"]),
  error: z.string().optional(),
  skipReason: z.string().optional(),
  durationMs: MillisSchema,
  metrics: z.record(z.union([z.number(), z.string(), z.boolean()])).optional(),
  suppressionReport: SuppressionReportSchema.optional(),
});

const WorkflowSchema = z.object({
  phases: z.array(
    z.object({
      name: z.string(),
      description: z.string(),
      priority: z.number().int(),
      categories: z.array(CategorySchema),
      estimatedTimeMs: MillisSchema,
      parallelGroups: z.array(z.string()),
    }),
  ),
  parallelGroups: z.array(
    z.object({
      name: z.string(),
      description: z.string(),
      files: z.array(z.string()),
      categories: z.array(CategorySchema),
      issueCount: CountSchema,
      estimatedTimeMs: MillisSchema,
    }),
  ),
  totalTimeMs: MillisSchema,
});

export const AssessmentReportSchema = z.object({
  metadata: z.object({
    generatedAt: z.string(),
    tool: z.string(),
    version: z.string(),
    target: z.string(),
    executionTimeMs: MillisSchema,
    commandsRun: z.array(z.string()),
    workerCount: z.number().int().positive(),
    failOn: SeveritySchema.optional(),
  }),
  summary: z.object({
    overallHealth: z.number().min(0).max(1),
    criticalIssues: CountSchema,
    totalIssues: CountSchema,
    estimatedTimeMs: MillisSchema,
    categoriesWithIssues: CountSchema,
    parallelGroups: CountSchema,
  }),
  categories: z.record(CategoryResultSchema),
  workflow: WorkflowSchema,
  workplan: z
    .object({
      categoriesPlanned: z.array(CategorySchema),
      categoriesSkipped: z.array(CategorySchema),
      skipReasons: z.record(z.string()),
      workerCount: z.number().int().positive(),
      categoryRuntimesMs: z.record(MillisSchema),
      totalRuntimeMs: MillisSchema,
      includePatterns: z.array(z.string()),
      excludePatterns: z.array(z.string()),
    })
    .optional(),
});

export function serializeReport(report: AssessmentReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

export function parseReport(text: string): AssessmentReport {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ReportParseError("report is not valid JSON", [error instanceof Error ? error.message : String(error)]);
  }
  const parsed = AssessmentReportSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ReportParseError(
      "report does not match the expected shape",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return parsed.data;
}
