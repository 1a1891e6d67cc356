import path from "node:path";
import { z } from "zod";
import { createSeverityMapper } from "../assess/severity.js";
import type { Issue } from "../types.js";
import { parseSuppressionsInFiles } from "../assess/suppressions.js";
import { commandExists } from "../utils/fs.js";
import { normalizeIssuePath } from "../utils/path.js";
import { parseError, parseJsonDocument, runTool, runToolExpectSuccess } from "./toolExec.js";
import type { AdapterContext, AdapterDefinition, SuppressingToolAdapter, SuppressionScan, ToolAdapter } from "./types.js";

export const BIOME_EXTENSIONS = new Set([".js", ".jsx", ".ts", ".tsx", ".mjs", ".cjs", ".mts", ".cts", ".json", ".jsonc"]);

// Older reporters give `path` as a plain string; newer ones wrap it as `{ file }`.
const PathSchema = z.union([z.string(), z.object({ file: z.string() }).transform((value) => value.file)]);

const DiagnosticSchema = z.object({
  category: z.string().default(""),
  severity: z.string().default(""),
  description: z.string().default(""),
  location: z
    .object({
      path: PathSchema.nullish(),
      start: z.object({ line: z.number().int(), column: z.number().int() }).nullish(),
    })
    .default({}),
});

const BiomeReportSchema = z.object({
  summary: z.record(z.unknown()).optional(),
  diagnostics: z.array(DiagnosticSchema),
});

type BiomeDiagnostic = z.infer<typeof DiagnosticSchema>;

export const mapBiomeSeverity = createSeverityMapper({
  fatal: "high",
  error: "high",
  warning: "medium",
  information: "low",
  info: "low",
  hint: "low",
});

const FORMAT_FIX_MS = 30_000;

export function biomeFiles(files: readonly string[]): string[] {
  return files.filter((file) => BIOME_EXTENSIONS.has(path.extname(file).toLowerCase()));
}

function readBiomeReport(text: string): BiomeDiagnostic[] {
  if (!text.trim()) return [];
  const report = parseJsonDocument(text, [BiomeReportSchema]);
  if (!report) {
    throw parseError("biome", "expected a JSON report with a diagnostics array");
  }
  return report.diagnostics;
}

export function parseBiomeLintOutput(text: string, rootDir = "."): Issue[] {
  const issues: Issue[] = [];
  for (const diagnostic of readBiomeReport(text)) {
    if (diagnostic.category.startsWith("internalError")) continue;
    if (diagnostic.category === "format") continue;
    issues.push({
      file: normalizeIssuePath(rootDir, diagnostic.location.path ?? ""),
      line: diagnostic.location.start?.line,
      column: diagnostic.location.start?.column,
      severity: mapBiomeSeverity(diagnostic.severity),
      message: `[${diagnostic.category}] ${diagnostic.description.trim()}`,
      category: "lint",
      subCategory: "js:biome",
      autoFixable: false,
    });
  }
  return issues;
}

export function formatIssue(file: string, message: string, subCategory: string): Issue {
  return {
    file,
    severity: "low",
    message,
    category: "format",
    subCategory,
    autoFixable: true,
    estimatedTimeMs: FORMAT_FIX_MS,
  };
}

/**
 * Files biome would reformat. When the check failed but named no file, every checked
 * file is reported so the failure is not lost.
 */
export function biomeFormatIssues(text: string, exitCode: number | null, checked: readonly string[], rootDir = "."): Issue[] {
  if (exitCode === 0) return [];

  let named: string[] = [];
  try {
    named = readBiomeReport(text)
      .filter((diagnostic) => diagnostic.category === "format")
      .map((diagnostic) => normalizeIssuePath(rootDir, diagnostic.location.path ?? ""))
      .filter(Boolean);
  } catch {
    named = [];
  }

  const files = named.length > 0 ? Array.from(new Set(named)) : [...checked];
  return files.map((file) => formatIssue(file, "File not formatted (biome format)", "js:biome-format"));
}

export class BiomeLintAdapter implements SuppressingToolAdapter {
  readonly name = "biome";
  readonly category = "lint" as const;

  constructor(private readonly context: AdapterContext) {}

  isAvailable(): boolean {
    return commandExists("biome", this.context.env) && biomeFiles(this.context.files).length > 0;
  }

  async run(signal: AbortSignal): Promise<Issue[]> {
    const files = biomeFiles(this.context.files);
    if (files.length === 0 || this.context.mode === "no-op") {
      return [];
    }
    if (this.context.mode === "fix") {
      await runToolExpectSuccess({ tool: this.name, command: "biome", args: ["lint", "--write", ...files] }, this.context, signal);
    }
    const result = await runTool(
      { tool: this.name, command: "biome", args: ["lint", "--reporter", "json", ...files] },
      this.context,
      signal,
    );
    return parseBiomeLintOutput(result.stdout, this.context.rootDir);
  }

  async runWithSuppressions(signal: AbortSignal): Promise<SuppressionScan> {
    const issues = await this.run(signal);
    const found = await parseSuppressionsInFiles(this.context.rootDir, biomeFiles(this.context.files));
    return { issues, suppressions: found.filter((suppression) => suppression.tool === "biome") };
  }
}

export class BiomeFormatAdapter implements ToolAdapter {
  readonly name = "biome-format";
  readonly category = "format" as const;

  constructor(private readonly context: AdapterContext) {}

  isAvailable(): boolean {
    return commandExists("biome", this.context.env) && biomeFiles(this.context.files).length > 0;
  }

  async run(signal: AbortSignal): Promise<Issue[]> {
    const files = biomeFiles(this.context.files);
    if (files.length === 0 || this.context.mode === "no-op") {
      return [];
    }
    if (this.context.mode === "fix") {
      await runToolExpectSuccess({ tool: this.name, command: "biome", args: ["format", "--write", ...files] }, this.context, signal);
      return [];
    }
    const result = await runTool(
      { tool: this.name, command: "biome", args: ["format", "--reporter", "json", ...files] },
      this.context,
      signal,
    );
    return biomeFormatIssues(result.stdout, result.exitCode, files, this.context.rootDir);
  }
}

export const biomeLintDefinition: AdapterDefinition = {
  name: "biome",
  binary: "biome",
  create: (context) => new BiomeLintAdapter(context),
};

export const biomeFormatDefinition: AdapterDefinition = {
  name: "biome-format",
  binary: "biome",
  create: (context) => new BiomeFormatAdapter(context),
};
