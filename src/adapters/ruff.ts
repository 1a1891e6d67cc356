import path from "node:path";
import { z } from "zod";
import { createSeverityMapper } from "../assess/severity.js";
import type { Issue } from "../types.js";
import { parseSuppressionsInFiles } from "../assess/suppressions.js";
import { commandExists } from "../utils/fs.js";
import { normalizeIssuePath } from "../utils/path.js";
import { formatIssue } from "./biome.js";
import { parseError, parseJsonDocument, runTool, runToolExpectSuccess } from "./toolExec.js";
import type { AdapterContext, AdapterDefinition, SuppressingToolAdapter, SuppressionScan, ToolAdapter } from "./types.js";

const RuffMessageSchema = z.object({
  code: z.string().nullish(),
  message: z.string(),
  filename: z.string(),
  location: z.object({ row: z.number().int(), column: z.number().int() }).nullish(),
  fix: z.unknown().optional(),
});

/** ruff has no per-rule severity; syntax errors (no code) rank above rule violations. */
export const mapRuffSeverity = createSeverityMapper({
  rule: "medium",
  syntax: "high",
});

export function pythonFiles(files: readonly string[]): string[] {
  return files.filter((file) => {
    const ext = path.extname(file).toLowerCase();
    return ext === ".py" || ext === ".pyi";
  });
}

export function parseRuffCheckOutput(text: string, rootDir = "."): Issue[] {
  if (!text.trim()) return [];
  const messages = parseJsonDocument(text, [z.array(RuffMessageSchema)]);
  if (!messages) {
    throw parseError("ruff", "expected a JSON array of diagnostics");
  }
  return messages.map((entry): Issue => {
    const code = entry.code?.trim();
    const message = entry.message.trim();
    return {
      file: normalizeIssuePath(rootDir, entry.filename),
      line: entry.location?.row,
      column: entry.location?.column,
      severity: mapRuffSeverity(code ? "rule" : "syntax"),
      message: code ? `${code} ${message}` : message,
      category: "lint",
      subCategory: "python:ruff",
      autoFixable: entry.fix !== undefined && entry.fix !== null,
    };
  });
}

/** `ruff format --check` lists "Would reformat: <path>" per file. */
export function ruffFormatIssues(text: string, exitCode: number | null, checked: readonly string[], rootDir = "."): Issue[] {
  if (exitCode === 0) return [];

  const touched: string[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    const colon = line.indexOf(":");
    if (colon === -1) continue;
    const candidate = line.slice(colon + 1).trim();
    if (/\.pyi?$/i.test(candidate)) {
      touched.push(normalizeIssuePath(rootDir, candidate));
    }
  }

  const files = touched.length > 0 ? touched : [...checked];
  return files.map((file) => formatIssue(file, "Python file not formatted (ruff format)", "python:ruff-format"));
}

export class RuffCheckAdapter implements SuppressingToolAdapter {
  readonly name = "ruff";
  readonly category = "lint" as const;

  constructor(private readonly context: AdapterContext) {}

  isAvailable(): boolean {
    return commandExists("ruff", this.context.env) && pythonFiles(this.context.files).length > 0;
  }

  async run(signal: AbortSignal): Promise<Issue[]> {
    const files = pythonFiles(this.context.files);
    if (files.length === 0 || this.context.mode === "no-op") {
      return [];
    }
    if (this.context.mode === "fix") {
      await runTool({ tool: this.name, command: "ruff", args: ["check", "--fix", ...files] }, this.context, signal);
    }
    const result = await runTool(
      { tool: this.name, command: "ruff", args: ["check", "--output-format", "json", ...files] },
      this.context,
      signal,
    );
    return parseRuffCheckOutput(result.stdout, this.context.rootDir);
  }

  async runWithSuppressions(signal: AbortSignal): Promise<SuppressionScan> {
    const issues = await this.run(signal);
    const found = await parseSuppressionsInFiles(this.context.rootDir, pythonFiles(this.context.files));
    return { issues, suppressions: found.filter((suppression) => suppression.tool === "ruff") };
  }
}

export class RuffFormatAdapter implements ToolAdapter {
  readonly name = "ruff-format";
  readonly category = "format" as const;

  constructor(private readonly context: AdapterContext) {}

  isAvailable(): boolean {
    return commandExists("ruff", this.context.env) && pythonFiles(this.context.files).length > 0;
  }

  async run(signal: AbortSignal): Promise<Issue[]> {
    const files = pythonFiles(this.context.files);
    if (files.length === 0 || this.context.mode === "no-op") {
      return [];
    }
    if (this.context.mode === "fix") {
      await runToolExpectSuccess({ tool: this.name, command: "ruff", args: ["format", ...files] }, this.context, signal);
      return [];
    }
    const result = await runTool({ tool: this.name, command: "ruff", args: ["format", "--check", ...files] }, this.context, signal);
    return ruffFormatIssues(`${result.stdout}\n${result.stderr}`, result.exitCode, files, this.context.rootDir);
  }
}

export const ruffCheckDefinition: AdapterDefinition = {
  name: "ruff",
  binary: "ruff",
  create: (context) => new RuffCheckAdapter(context),
};

export const ruffFormatDefinition: AdapterDefinition = {
  name: "ruff-format",
  binary: "ruff",
  create: (context) => new RuffFormatAdapter(context),
};
