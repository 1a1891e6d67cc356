import path from "node:path";
import { ConfigError } from "../errors.js";
import type { AssessmentReport } from "../types.js";
import { ensureDir, writeJsonFile, writeTextFile } from "../utils/fs.js";
import { serializeReport } from "./json.js";
import { renderReportMarkdown } from "./markdown.js";
import { buildIssuesSarif } from "./sarif.js";

export const REPORT_FORMATS = ["json", "md", "sarif"] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export const REPORT_FILES: Record<ReportFormat, string> = {
  json: "report.json",
  md: "report.md",
  sarif: "report.sarif",
};

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

/** Parses `--format md,json`; "markdown" is accepted for md. Order and duplicates do not matter. */
export function parseReportFormats(value: string): ReportFormat[] {
  const formats = new Set<ReportFormat>();
  for (const raw of value.split(",")) {
    const name = raw.trim().toLowerCase();
    if (!name) continue;
    const normalized = name === "markdown" ? "md" : name;
    if (!isReportFormat(normalized)) {
      throw new ConfigError(`--format: unknown report format "${raw.trim()}" (expected ${REPORT_FORMATS.join(", ")})`);
    }
    formats.add(normalized);
  }
  if (formats.size === 0) {
    throw new ConfigError("--format: at least one report format is required");
  }
  return REPORT_FORMATS.filter((format) => formats.has(format));
}

/** Writes each requested artifact and returns the paths written, in format order. */
export async function writeReportArtifacts(
  outputDir: string,
  report: AssessmentReport,
  formats: readonly ReportFormat[],
): Promise<string[]> {
  await ensureDir(outputDir);
  const written: string[] = [];
  for (const format of REPORT_FORMATS) {
    if (!formats.includes(format)) continue;
    const file = path.join(outputDir, REPORT_FILES[format]);
    if (format === "json") {
      await writeTextFile(file, serializeReport(report));
    } else if (format === "md") {
      await writeTextFile(file, renderReportMarkdown(report));
    } else {
      await writeJsonFile(file, buildIssuesSarif(report));
    }
    written.push(file);
  }
  return written;
}
