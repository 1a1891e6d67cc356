import path from "node:path";
import { createSeverityMapper } from "../assess/severity.js";
import { ToolExecutionError } from "../errors.js";
import type { Issue } from "../types.js";
import { commandExists, fileExistsSync } from "../utils/fs.js";
import { normalizeIssuePath } from "../utils/path.js";
import { runTool } from "./toolExec.js";
import type { AdapterContext, AdapterDefinition, ToolAdapter } from "./types.js";

export const TSCONFIG_NAMES = ["tsconfig.json", "tsconfig.build.json"];

const TYPESCRIPT_EXTENSIONS = new Set([".ts", ".tsx", ".mts", ".cts"]);

// With `--pretty false`: src/a.ts(3,7): error TS2322: Type 'string' is not assignable to type 'number'.
const DIAGNOSTIC_PATTERN = /^(.+)\((\d+),(\d+)\): (error|warning) (TS\d+): (.+)$/;

export const mapTscSeverity = createSeverityMapper({
  error: "high",
  warning: "medium",
});

export function typescriptFiles(files: readonly string[]): string[] {
  return files.filter((file) => TYPESCRIPT_EXTENSIONS.has(path.extname(file).toLowerCase()));
}

export function findTsconfig(rootDir: string): string | null {
  for (const name of TSCONFIG_NAMES) {
    const candidate = path.join(rootDir, name);
    if (fileExistsSync(candidate)) return candidate;
  }
  return null;
}

/** The project's own compiler wins over one on PATH. */
export function resolveTscBinary(rootDir: string, env?: NodeJS.ProcessEnv): string | null {
  const local = path.join(rootDir, "node_modules", ".bin", "tsc");
  if (fileExistsSync(local)) return local;
  return commandExists("tsc", env) ? "tsc" : null;
}

export function parseTscOutput(text: string, rootDir = "."): Issue[] {
  const issues: Issue[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const match = DIAGNOSTIC_PATTERN.exec(rawLine.trim());
    if (!match) continue;
    const [, file, line, column, level, code, message] = match;
    issues.push({
      file: normalizeIssuePath(rootDir, file),
      line: Number(line),
      column: Number(column),
      severity: mapTscSeverity(level),
      message: `${code}: ${message.trim()}`,
      category: "static-analysis",
      subCategory: "typescript:tsc",
      autoFixable: false,
    });
  }
  return issues;
}

/** tsc exits non-zero when it reports diagnostics; a failure that printed none is a tool error. */
export function tscIssues(text: string, exitCode: number | null, rootDir = "."): Issue[] {
  const issues = parseTscOutput(text, rootDir);
  if (exitCode !== 0 && issues.length === 0) {
    const detail = text.trim().split(/\r?\n/)[0] || `exit code ${exitCode}`;
    throw new ToolExecutionError("tsc", "parse", `tsc failed without diagnostics: ${detail}`);
  }
  return issues;
}

export class TscAdapter implements ToolAdapter {
  readonly name = "tsc";
  readonly category = "static-analysis" as const;

  constructor(private readonly context: AdapterContext) {}

  isAvailable(): boolean {
    return (
      typescriptFiles(this.context.files).length > 0 &&
      findTsconfig(this.context.rootDir) !== null &&
      resolveTscBinary(this.context.rootDir, this.context.env) !== null
    );
  }

  // tsc has nothing to fix, so fix mode reports like check mode.
  async run(signal: AbortSignal): Promise<Issue[]> {
    const project = findTsconfig(this.context.rootDir);
    const binary = resolveTscBinary(this.context.rootDir, this.context.env);
    if (this.context.mode === "no-op" || !project || !binary) {
      return [];
    }
    const result = await runTool(
      { tool: this.name, command: binary, args: ["--noEmit", "--pretty", "false", "--project", project] },
      this.context,
      signal,
    );
    return tscIssues(`${result.stdout}\n${result.stderr}`, result.exitCode, this.context.rootDir);
  }
}

export const tscDefinition: AdapterDefinition = {
  name: "tsc",
  binary: "tsc",
  projectLocal: true,
  create: (context) => new TscAdapter(context),
};
