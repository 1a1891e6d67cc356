import { z } from "zod";
import { createSeverityMapper } from "../assess/severity.js";
import type { AssessmentCategory, Issue, Severity } from "../types.js";
import { commandExists } from "../utils/fs.js";
import { detectRustProject, rustIssueFile } from "./rustProject.js";
import { parseError, parseJsonDocument, parseJsonLines, runTool } from "./toolExec.js";
import type { AdapterContext, AdapterDefinition, ToolAdapter } from "./types.js";

const DenyFieldsSchema = z
  .object({
    message: z.string(),
    severity: z.string(),
    code: z.string(),
  })
  .partial();

// Newer releases nest the diagnostic under `fields`; lift it so both shapes read the same.
const DenyEntrySchema = z
  .object({
    type: z.string().default(""),
    severity: z.string().default(""),
    message: z.string().default(""),
    id: z.string().default(""),
    fields: DenyFieldsSchema.optional(),
    advisory: z
      .object({
        id: z.string().default(""),
        title: z.string().default(""),
        severity: z.string().default(""),
      })
      .nullish(),
  })
  .transform(({ fields, ...entry }) => ({
    ...entry,
    message: entry.message || fields?.message || "",
    severity: entry.severity || fields?.severity || "",
    id: entry.id || fields?.code || "",
  }));

export type CargoDenyEntry = z.infer<typeof DenyEntrySchema>;

const SingleEntrySchema = DenyEntrySchema.refine((entry) => entry.type !== "" || entry.message !== "", {
  message: "not a cargo-deny entry",
});

/** JSON array, then a single object, then one object per line; anything else fails. */
export function parseCargoDenyEntries(text: string): CargoDenyEntry[] {
  const trimmed = text.trim();
  if (!trimmed) return [];

  const document = parseJsonDocument(trimmed, [
    z.array(DenyEntrySchema),
    SingleEntrySchema.transform((entry) => [entry]),
  ]);
  if (document) return document;

  const lines = parseJsonLines(trimmed, DenyEntrySchema);
  if (lines.length > 0) return lines;

  throw parseError("cargo-deny", "no recognizable JSON records");
}

export const mapCargoDenySeverity = createSeverityMapper({
  critical: "critical",
  high: "high",
  error: "high",
  medium: "medium",
  moderate: "medium",
  warning: "medium",
  low: "low",
});

const mapDependencyDiagnosticSeverity = createSeverityMapper({
  error: "high",
  warning: "medium",
  note: "low",
  help: "low",
});

function entryKind(entry: CargoDenyEntry): "license" | "bans" | "other" {
  const type = entry.type.toLowerCase();
  if (type === "license" || type === "licenses") return "license";
  if (type === "ban" || type === "bans") return "bans";
  return "other";
}

function entryMessage(entry: CargoDenyEntry, useAdvisoryTitle: boolean): string {
  let message = entry.message.trim();
  if (!message && useAdvisoryTitle && entry.advisory) {
    message = entry.advisory.title.trim();
  }
  if (!message) message = "cargo-deny finding";
  if (entry.type) message = `${entry.type}: ${message}`;

  let id = entry.id.trim();
  if (!id && useAdvisoryTitle && entry.advisory) id = entry.advisory.id.trim();
  return id ? `cargo-deny(${id}): ${message}` : `cargo-deny: ${message}`;
}

export function cargoDenySecurityIssues(entries: CargoDenyEntry[], file: string): Issue[] {
  return entries.map((entry): Issue => ({
    file,
    severity: mapCargoDenySeverity(entry.severity || entry.advisory?.severity),
    message: entryMessage(entry, true),
    category: "security",
    subCategory: "rust:cargo-deny",
    autoFixable: false,
  }));
}

const DEPENDENCY_REVIEW_MS = 30 * 60_000;

export function cargoDenyDependencyIssues(entries: CargoDenyEntry[], file: string): Issue[] {
  return entries.map((entry): Issue => {
    const kind = entryKind(entry);
    let severity: Severity;
    let subCategory = "rust:cargo-deny";
    if (kind === "license") {
      severity = "high";
      subCategory = "rust:cargo-deny:license";
    } else if (kind === "bans") {
      severity = "medium";
      subCategory = "rust:cargo-deny:bans";
    } else {
      severity = mapDependencyDiagnosticSeverity(entry.severity);
    }
    return {
      file,
      severity,
      message: entryMessage(entry, false),
      category: "dependencies",
      subCategory,
      autoFixable: false,
      estimatedTimeMs: DEPENDENCY_REVIEW_MS,
    };
  });
}

export type CargoDenyMode = "security" | "dependencies";

const CHECKS: Record<CargoDenyMode, string[]> = {
  security: ["advisories", "sources"],
  dependencies: ["licenses", "bans"],
};

export class CargoDenyAdapter implements ToolAdapter {
  readonly name = "cargo-deny";
  readonly category: AssessmentCategory;

  constructor(
    private readonly context: AdapterContext,
    private readonly checkMode: CargoDenyMode,
  ) {
    this.category = checkMode;
  }

  isAvailable(): boolean {
    return commandExists("cargo-deny", this.context.env) && detectRustProject(this.context.rootDir) !== null;
  }

  async run(signal: AbortSignal): Promise<Issue[]> {
    const project = detectRustProject(this.context.rootDir);
    if (!project || this.context.mode === "no-op") {
      return [];
    }

    const result = await runTool(
      { tool: this.name, command: "cargo", args: ["deny", "check", ...CHECKS[this.checkMode], "--format", "json"] },
      this.context,
      signal,
    );
    // cargo-deny writes its diagnostics to stderr.
    const output = result.stdout.trim() ? result.stdout : result.stderr;
    if (!output.trim()) {
      return [];
    }

    const entries = parseCargoDenyEntries(output);
    const file = rustIssueFile(project);
    return this.checkMode === "security"
      ? cargoDenySecurityIssues(entries, file)
      : cargoDenyDependencyIssues(entries, file);
  }
}

export const cargoDenySecurityDefinition: AdapterDefinition = {
  name: "cargo-deny",
  binary: "cargo-deny",
  create: (context) => new CargoDenyAdapter(context, "security"),
};

export const cargoDenyDependencyDefinition: AdapterDefinition = {
  name: "cargo-deny",
  binary: "cargo-deny",
  create: (context) => new CargoDenyAdapter(context, "dependencies"),
};
