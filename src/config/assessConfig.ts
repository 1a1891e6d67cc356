import path from "node:path";
import { z } from "zod";
import { PriorityManager } from "../assess/priorities.js";
import { DEFAULT_HEALTH_WEIGHTS, validateHealthWeights } from "../assess/summary.js";
import { DEFAULT_CONCURRENCY_PERCENT } from "../assess/workerPool.js";
import { ConfigError, errorMessage } from "../errors.js";
import {
  ASSESSMENT_CATEGORIES,
  ASSESSMENT_MODES,
  SEVERITIES,
  isAssessmentCategory,
  type AssessmentConfig,
} from "../types.js";
import { readTextIfExists } from "../utils/fs.js";
import { MAX_TIMER_MS, formatDuration, parseDuration } from "../utils/time.js";

export const CONFIG_DIR = ".assayer";
export const CONFIG_FILE = "assess.json";
export const DEFAULT_TIMEOUT_MS = 5 * 60_000;

// Durations in the file are strings such as "90s" or "1h30m", or plain milliseconds.
const DURATION_LIMIT_MESSAGE = `must not exceed ${formatDuration(MAX_TIMER_MS)}`;

const DurationSchema = z.union([
  z.number().nonnegative().max(MAX_TIMER_MS, { message: DURATION_LIMIT_MESSAGE }),
  z.string().transform((value, ctx) => {
    const parsed = parseDuration(value);
    if (parsed === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid duration "${value}"` });
      return z.NEVER;
    }
    if (parsed > MAX_TIMER_MS) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duration "${value}" ${DURATION_LIMIT_MESSAGE}` });
      return z.NEVER;
    }
    return parsed;
  }),
]);

const StringListSchema = z.array(z.string());

export const AssessConfigFileSchema = z
  .object({
    mode: z.enum(ASSESSMENT_MODES),
    timeout: DurationSchema,
    totalTimeout: DurationSchema,
    include: StringListSchema,
    exclude: StringListSchema,
    noIgnore: z.boolean(),
    forceInclude: StringListSchema,
    concurrency: z.number().int().nonnegative(),
    concurrencyPercent: z.number().min(0).max(100),
    failOn: z.enum(SEVERITIES),
    categories: StringListSchema,
    priority: z.string(),
    trackSuppressions: z.boolean(),
    extended: z.boolean(),
    healthWeights: z.object({
      critical: z.number(),
      high: z.number(),
      medium: z.number(),
      low: z.number(),
      info: z.number(),
    }).partial(),
  })
  .partial()
  .strict();

export type AssessConfigFile = z.infer<typeof AssessConfigFileSchema>;

export function createDefaultAssessmentConfig(): AssessmentConfig {
  return {
    mode: "check",
    verbose: false,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    totalTimeoutMs: 0,
    includeFiles: [],
    excludeFiles: [],
    noIgnore: false,
    forceInclude: [],
    priorityString: "",
    failOn: "critical",
    selectedCategories: [],
    concurrency: 0,
    concurrencyPercent: DEFAULT_CONCURRENCY_PERCENT,
    trackSuppressions: false,
    extended: false,
    healthWeights: { ...DEFAULT_HEALTH_WEIGHTS },
  };
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function parseAssessConfigText(text: string, source: string): AssessConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`invalid JSON: ${errorMessage(error)}`, source);
  }
  const parsed = AssessConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(formatZodIssues(parsed.error), source);
  }
  return parsed.data;
}

/**
 * Reads `.assayer/assess.json` under the target, or `explicitPath` when given.
 * A missing default file means no overrides; a missing explicit file is an error.
 */
export async function loadAssessConfigFile(
  rootDir: string,
  explicitPath?: string,
): Promise<{ source: string | null; file: AssessConfigFile }> {
  const candidate = explicitPath
    ? path.resolve(rootDir, explicitPath)
    : path.join(rootDir, CONFIG_DIR, CONFIG_FILE);
  const text = await readTextIfExists(candidate);
  if (text === null) {
    if (explicitPath) {
      throw new ConfigError("config file not found", candidate);
    }
    return { source: null, file: {} };
  }
  if (!text.trim()) {
    return { source: candidate, file: {} };
  }
  return { source: candidate, file: parseAssessConfigText(text, candidate) };
}

export function mergeConfigFile(base: AssessmentConfig, file: AssessConfigFile): AssessmentConfig {
  return {
    ...base,
    mode: file.mode ?? base.mode,
    timeoutMs: file.timeout ?? base.timeoutMs,
    totalTimeoutMs: file.totalTimeout ?? base.totalTimeoutMs,
    includeFiles: file.include ?? base.includeFiles,
    excludeFiles: file.exclude ?? base.excludeFiles,
    noIgnore: file.noIgnore ?? base.noIgnore,
    forceInclude: file.forceInclude ?? base.forceInclude,
    concurrency: file.concurrency ?? base.concurrency,
    concurrencyPercent: file.concurrencyPercent ?? base.concurrencyPercent,
    failOn: file.failOn ?? base.failOn,
    selectedCategories: file.categories ?? base.selectedCategories,
    priorityString: file.priority ?? base.priorityString,
    trackSuppressions: file.trackSuppressions ?? base.trackSuppressions,
    extended: file.extended ?? base.extended,
    healthWeights: { ...base.healthWeights, ...file.healthWeights },
  };
}

/** Rejects combinations no single field schema can catch. */
export function validateAssessmentConfig(config: AssessmentConfig, source?: string): AssessmentConfig {
  const problems: string[] = [];

  const unknown = config.selectedCategories.filter((name) => !isAssessmentCategory(name));
  if (unknown.length > 0) {
    problems.push(`unknown categories: ${unknown.join(", ")} (expected ${ASSESSMENT_CATEGORIES.join(", ")})`);
  }
  problems.push(...validateHealthWeights(config.healthWeights).map((problem) => `healthWeights: ${problem}`));
  try {
    new PriorityManager().parsePriorityString(config.priorityString);
  } catch (error) {
    problems.push(`priority: ${errorMessage(error)}`);
  }
  problems.push(...validateTimeouts(config));

  if (problems.length > 0) {
    throw new ConfigError(problems.join("; "), source);
  }
  return config;
}

/** Timeout problems; also checked by the engine for callers that skip this module. */
export function validateTimeouts(config: Pick<AssessmentConfig, "timeoutMs" | "totalTimeoutMs">): string[] {
  const problems: string[] = [];
  if (config.timeoutMs < 0 || config.totalTimeoutMs < 0) {
    problems.push("timeouts must not be negative");
  }
  if (config.timeoutMs > MAX_TIMER_MS || config.totalTimeoutMs > MAX_TIMER_MS) {
    problems.push(`timeouts ${DURATION_LIMIT_MESSAGE}`);
  }
  return problems;
}

export interface ResolveConfigInput {
  rootDir: string;
  configPath?: string;
  /** Applied last; only defined fields override. */
  overrides?: Partial<AssessmentConfig>;
}

export async function resolveAssessmentConfig(input: ResolveConfigInput): Promise<AssessmentConfig> {
  const { source, file } = await loadAssessConfigFile(input.rootDir, input.configPath);
  const merged = mergeConfigFile(createDefaultAssessmentConfig(), file);
  return validateAssessmentConfig(applyOverrides(merged, input.overrides ?? {}), source ?? undefined);
}

export function applyOverrides(base: AssessmentConfig, overrides: Partial<AssessmentConfig>): AssessmentConfig {
  return {
    mode: overrides.mode ?? base.mode,
    verbose: overrides.verbose ?? base.verbose,
    timeoutMs: overrides.timeoutMs ?? base.timeoutMs,
    totalTimeoutMs: overrides.totalTimeoutMs ?? base.totalTimeoutMs,
    includeFiles: overrides.includeFiles ?? base.includeFiles,
    excludeFiles: overrides.excludeFiles ?? base.excludeFiles,
    noIgnore: overrides.noIgnore ?? base.noIgnore,
    forceInclude: overrides.forceInclude ?? base.forceInclude,
    priorityString: overrides.priorityString ?? base.priorityString,
    failOn: overrides.failOn ?? base.failOn,
    selectedCategories: overrides.selectedCategories ?? base.selectedCategories,
    concurrency: overrides.concurrency ?? base.concurrency,
    concurrencyPercent: overrides.concurrencyPercent ?? base.concurrencyPercent,
    trackSuppressions: overrides.trackSuppressions ?? base.trackSuppressions,
    extended: overrides.extended ?? base.extended,
    healthWeights: overrides.healthWeights ?? base.healthWeights,
  };
}

/** Parses a duration flag such as "--timeout 90s"; bare numbers are seconds. */
export function parseDurationOption(value: string, flag: string): number {
  const trimmed = value.trim();
  const parsed = /^\d+(?:\.\d+)?$/.test(trimmed) ? Math.round(Number(trimmed) * 1000) : parseDuration(trimmed);
  if (parsed === null) {
    throw new ConfigError(`${flag}: invalid duration "${value}" (use 90s, 5m, 1h30m)`);
  }
  if (parsed > MAX_TIMER_MS) {
    throw new ConfigError(`${flag}: duration "${value}" ${DURATION_LIMIT_MESSAGE}`);
  }
  return parsed;
}
