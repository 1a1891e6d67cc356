import path from "node:path";
import { EXIT_FAIL_ON, EXIT_OK, evaluateFailOn } from "../assess/failOn.js";
import { parseSeverity } from "../assess/severity.js";
import { ConfigError } from "../errors.js";
import { printFailOnVerdict, printReportSummary } from "../output/console.js";
import { parseReport } from "../output/json.js";
import { renderReportMarkdown } from "../output/markdown.js";
import { REPORT_FILES } from "../output/writer.js";
import { configureUi, getUiRuntime } from "../ui/runtime.js";
import { isDirectory, readTextIfExists } from "../utils/fs.js";

export interface ReportCliOptions {
  md?: boolean;
  failOn?: string;
}

/** Accepts a report.json path or the directory holding it. */
export async function resolveReportPath(input: string, cwd = process.cwd()): Promise<string> {
  const resolved = path.resolve(cwd, input);
  return (await isDirectory(resolved)) ? path.join(resolved, REPORT_FILES.json) : resolved;
}

export async function reportCommand(input: string, cli: ReportCliOptions): Promise<number> {
  const reportPath = await resolveReportPath(input);
  const text = await readTextIfExists(reportPath);
  if (text === null) {
    throw new ConfigError("report not found", reportPath);
  }
  const report = parseReport(text);

  if (cli.md) {
    process.stdout.write(renderReportMarkdown(report));
    return EXIT_OK;
  }

  configureUi({ animation: false });
  const ui = getUiRuntime();
  printReportSummary(ui, report);

  const threshold = cli.failOn !== undefined ? parseSeverity(cli.failOn) : report.metadata.failOn ?? null;
  if (cli.failOn !== undefined && threshold === null) {
    throw new ConfigError(`--fail-on: unknown severity "${cli.failOn}"`);
  }
  if (threshold === null) {
    return EXIT_OK;
  }
  const verdict = evaluateFailOn(report, threshold);
  printFailOnVerdict(ui, verdict, threshold);
  return verdict.fail ? EXIT_FAIL_ON : EXIT_OK;
}
