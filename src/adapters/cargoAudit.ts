import { z } from "zod";
import { createSeverityMapper } from "../assess/severity.js";
import type { Issue } from "../types.js";
import { commandExists } from "../utils/fs.js";
import { detectRustProject, rustIssueFile } from "./rustProject.js";
import { parseError, parseJsonDocument, runTool } from "./toolExec.js";
import type { AdapterContext, AdapterDefinition, ToolAdapter } from "./types.js";

const AuditReportSchema = z.object({
  vulnerabilities: z.object({
    list: z.array(
      z.object({
        advisory: z.object({
          id: z.string(),
          title: z.string().default(""),
          severity: z.string().nullish(),
          url: z.string().nullish(),
        }),
        package: z
          .object({
            name: z.string().default(""),
            version: z.string().default(""),
          })
          .default({}),
      }),
    ),
  }),
});

export const mapCargoAuditSeverity = createSeverityMapper({
  critical: "critical",
  high: "high",
  medium: "medium",
  moderate: "medium",
  low: "low",
});

export function parseCargoAuditOutput(text: string, file: string): Issue[] {
  if (!text.trim()) return [];
  const report = parseJsonDocument(text, [AuditReportSchema]);
  if (!report) {
    throw parseError("cargo-audit", "expected a JSON report with vulnerabilities.list");
  }

  return report.vulnerabilities.list.map((vulnerability): Issue => {
    const { advisory, package: crate } = vulnerability;
    let message = advisory.title.trim() || "cargo-audit advisory";
    if (crate.name) message = `${message} (crate: ${crate.name} ${crate.version})`;
    if (advisory.url) message = `${message} - ${advisory.url}`;
    return {
      file,
      severity: mapCargoAuditSeverity(advisory.severity),
      message: `cargo-audit(${advisory.id}): ${message}`,
      category: "security",
      subCategory: "rust:cargo-audit",
      autoFixable: false,
    };
  });
}

export class CargoAuditAdapter implements ToolAdapter {
  readonly name = "cargo-audit";
  readonly category = "security" as const;

  constructor(private readonly context: AdapterContext) {}

  isAvailable(): boolean {
    return commandExists("cargo-audit", this.context.env) && detectRustProject(this.context.rootDir) !== null;
  }

  async run(signal: AbortSignal): Promise<Issue[]> {
    const project = detectRustProject(this.context.rootDir);
    if (!project || this.context.mode === "no-op") {
      return [];
    }
    const result = await runTool({ tool: this.name, command: "cargo", args: ["audit", "--json"] }, this.context, signal);
    return parseCargoAuditOutput(result.stdout, rustIssueFile(project));
  }
}

export const cargoAuditDefinition: AdapterDefinition = {
  name: "cargo-audit",
  binary: "cargo-audit",
  create: (context) => new CargoAuditAdapter(context),
};
