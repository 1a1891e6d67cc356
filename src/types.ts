export const SEVERITIES = ["info", "low", "medium", "high", "critical"] as const;
export type Severity = (typeof SEVERITIES)[number];

export const ASSESSMENT_CATEGORIES = [
  "format",
  "lint",
  "static-analysis",
  "security",
  "performance",
  "schema",
  "dates",
  "tools",
  "maturity",
  "repo-status",
  "dependencies",
] as const;
export type AssessmentCategory = (typeof ASSESSMENT_CATEGORIES)[number];

export const ASSESSMENT_MODES = ["no-op", "check", "fix"] as const;
export type AssessmentMode = (typeof ASSESSMENT_MODES)[number];

export type CategoryStatus = "success" | "error" | "skipped";

/** File value used for findings that are not tied to one path, such as dirty git state. */
export const REPOSITORY_FILE = "repository";

export interface Issue {
  file: string;
  line?: number;
  column?: number;
  severity: Severity;
  message: string;
  category: AssessmentCategory;
  subCategory?: string;
  autoFixable: boolean;
  estimatedTimeMs?: number;
}

export interface Suppression {
  tool: string;
  ruleId?: string;
  file: string;
  line: number;
  syntax: string;
  reason?: string;
}

export interface TopItem {
  name: string;
  count: number;
}

export interface SuppressionSummary {
  total: number;
  byTool: Record<string, number>;
  byRule: Record<string, number>;
  byFile: Record<string, number>;
  topRules: TopItem[];
  topFiles: TopItem[];
  withReason: number;
  withoutReason: number;
}

export interface SuppressionReport {
  suppressions: Suppression[];
  summary: SuppressionSummary;
}

export type MetricValue = number | string | boolean;

export interface CategoryResult {
  category: AssessmentCategory;
  priority: number;
  issues: Issue[];
  issueCount: number;
  estimatedTimeMs: number;
  parallelizable: boolean;
  status: CategoryStatus;
  error?: string;
  skipReason?: string;
  durationMs: number;
  metrics?: Record<string, MetricValue>;
  suppressionReport?: SuppressionReport;
}

/** What a category runner hands back to the engine for one invocation. */
export interface AssessmentResult {
  commandName: string;
  category: AssessmentCategory;
  success: boolean;
  executionTimeMs: number;
  issues: Issue[];
  error?: string;
  metrics?: Record<string, MetricValue>;
  suppressions?: Suppression[];
}

export interface WorkflowPhase {
  name: string;
  description: string;
  priority: number;
  categories: AssessmentCategory[];
  estimatedTimeMs: number;
  parallelGroups: string[];
}

export interface ParallelGroup {
  name: string;
  description: string;
  files: string[];
  categories: AssessmentCategory[];
  issueCount: number;
  estimatedTimeMs: number;
}

export interface WorkflowPlan {
  phases: WorkflowPhase[];
  parallelGroups: ParallelGroup[];
  totalTimeMs: number;
}

export interface ReportSummary {
  overallHealth: number;
  criticalIssues: number;
  totalIssues: number;
  estimatedTimeMs: number;
  categoriesWithIssues: number;
  parallelGroups: number;
}

export interface ReportMetadata {
  generatedAt: string;
  tool: string;
  version: string;
  target: string;
  executionTimeMs: number;
  commandsRun: string[];
  workerCount: number;
  failOn?: Severity;
}

export interface ExtendedWorkplan {
  categoriesPlanned: AssessmentCategory[];
  categoriesSkipped: AssessmentCategory[];
  skipReasons: Record<string, string>;
  workerCount: number;
  categoryRuntimesMs: Record<string, number>;
  totalRuntimeMs: number;
  includePatterns: string[];
  excludePatterns: string[];
}

export interface AssessmentReport {
  metadata: ReportMetadata;
  summary: ReportSummary;
  categories: Record<string, CategoryResult>;
  workflow: WorkflowPlan;
  workplan?: ExtendedWorkplan;
}

export type HealthWeights = Record<Severity, number>;

export interface AssessmentConfig {
  mode: AssessmentMode;
  verbose: boolean;
  timeoutMs: number;
  totalTimeoutMs: number;
  includeFiles: string[];
  excludeFiles: string[];
  noIgnore: boolean;
  forceInclude: string[];
  priorityString: string;
  failOn: Severity;
  selectedCategories: string[];
  concurrency: number;
  concurrencyPercent: number;
  trackSuppressions: boolean;
  extended: boolean;
  healthWeights: HealthWeights;
}

export interface StageLogEntry {
  ts: string;
  stage: string;
  event: "start" | "end" | "debug" | "info" | "warn" | "error";
  message?: string;
  durationMs?: number;
  inputSummary?: Record<string, unknown>;
  counts?: Record<string, number>;
  warnings?: string[];
  error?: string;
}

export interface Logger {
  log(entry: StageLogEntry): Promise<void>;
  debug(stage: string, message: string): Promise<void>;
  info(stage: string, message: string): Promise<void>;
  warn(stage: string, message: string): Promise<void>;
  error(stage: string, message: string): Promise<void>;
  stageStart(stage: string, inputSummary?: Record<string, unknown>): Promise<number>;
  stageEnd(
    stage: string,
    startedAt: number,
    counts?: Record<string, number>,
    warnings?: string[],
  ): Promise<void>;
  stageError(stage: string, startedAt: number, error: unknown): Promise<void>;
}

export interface DoctorCheck {
  tool: string;
  category: AssessmentCategory;
  available: boolean;
  note?: string;
}

export function isAssessmentCategory(value: string): value is AssessmentCategory {
  return ASSESSMENT_CATEGORIES.some((category) => category === value);
}
