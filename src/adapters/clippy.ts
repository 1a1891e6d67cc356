import { z } from "zod";
import { createSeverityMapper } from "../assess/severity.js";
import type { Issue } from "../types.js";
import { commandExists } from "../utils/fs.js";
import { normalizeIssuePath } from "../utils/path.js";
import { detectRustProject } from "./rustProject.js";
import { parseJsonLines, runTool, runToolExpectSuccess } from "./toolExec.js";
import type { AdapterContext, AdapterDefinition, ToolAdapter } from "./types.js";

const SpanSchema = z.object({
  file_name: z.string(),
  line_start: z.number().int(),
  column_start: z.number().int(),
  is_primary: z.boolean().default(false),
});

const CompilerMessageSchema = z.object({
  reason: z.literal("compiler-message"),
  message: z.object({
    message: z.string(),
    level: z.string(),
    code: z.object({ code: z.string() }).nullish(),
    spans: z.array(SpanSchema).default([]),
  }),
});

type ClippySpan = z.infer<typeof SpanSchema>;

/** Notes and help lines are attached context, not findings. */
export const CLIPPY_LEVELS = new Set(["warning", "error"]);

export const mapClippySeverity = createSeverityMapper({
  warning: "medium",
  error: "high",
});

function pickSpan(spans: ClippySpan[]): ClippySpan | undefined {
  return spans.find((span) => span.is_primary) ?? spans[0];
}

/** Reads `cargo clippy --message-format=json`; build artifacts and other records are ignored. */
export function parseClippyOutput(text: string, rootDir = "."): Issue[] {
  const issues: Issue[] = [];
  for (const record of parseJsonLines(text, CompilerMessageSchema)) {
    const { message } = record;
    const level = message.level.trim().toLowerCase();
    if (!CLIPPY_LEVELS.has(level)) continue;

    const span = pickSpan(message.spans);
    const code = message.code?.code.trim();
    let summary = message.message.trim();
    if (code) summary = `${code}: ${summary}`;

    issues.push({
      file: span ? normalizeIssuePath(rootDir, span.file_name) : "",
      line: span?.line_start,
      column: span?.column_start,
      severity: mapClippySeverity(level),
      message: summary || "clippy finding",
      category: "lint",
      subCategory: "rust:clippy",
      autoFixable: false,
    });
  }
  return issues;
}

export class ClippyAdapter implements ToolAdapter {
  readonly name = "cargo-clippy";
  readonly category = "lint" as const;

  constructor(private readonly context: AdapterContext) {}

  isAvailable(): boolean {
    return commandExists("cargo", this.context.env) && detectRustProject(this.context.rootDir) !== null;
  }

  async run(signal: AbortSignal): Promise<Issue[]> {
    const project = detectRustProject(this.context.rootDir);
    if (!project || this.context.mode === "no-op") {
      return [];
    }

    const workspace = project.isWorkspace ? ["--workspace"] : [];
    if (this.context.mode === "fix") {
      await runToolExpectSuccess(
        { tool: this.name, command: "cargo", args: ["clippy", "--fix", "--allow-dirty", "--allow-staged", ...workspace] },
        this.context,
        signal,
      );
    }

    const result = await runTool(
      { tool: this.name, command: "cargo", args: ["clippy", "--message-format=json", ...workspace] },
      this.context,
      signal,
    );
    if (!result.stdout.trim()) {
      return [];
    }
    return parseClippyOutput(result.stdout, project.root);
  }
}

export const clippyDefinition: AdapterDefinition = {
  name: "cargo-clippy",
  binary: "cargo",
  create: (context) => new ClippyAdapter(context),
};
