#!/usr/bin/env node
import { Command, CommanderError } from "commander";
import { EXIT_CONFIG_ERROR, EXIT_FAIL_ON } from "./assess/failOn.js";
import { assessCommand, type AssessCliOptions } from "./commands/assess.js";
import { doctorCommand } from "./commands/doctor.js";
import { hooksRunCommand, type HooksCliOptions } from "./commands/hooks.js";
import { reportCommand, type ReportCliOptions } from "./commands/report.js";
import { ConfigError, ReportParseError, errorMessage } from "./errors.js";
import { TOOL_NAME, TOOL_VERSION } from "./version.js";

const program = new Command();

program
  .name(TOOL_NAME)
  .description("Run formatters, linters and security scanners over a repository and merge their findings into one prioritized report.")
  .version(TOOL_VERSION)
  .exitOverride();

program
  .command("assess")
  .description("Assess a local repository and write report artifacts")
  .argument("[target]", "repository directory", ".")
  .option("--categories <list>", "comma-separated categories to run (default: every available one)")
  .option("--mode <mode>", "no-op, check or fix")
  .option("--fix", "shorthand for --mode fix")
  .option("--format <list>", "report formats: md, json, sarif", "md,json")
  .option("--out <dir>", "output directory (default: <target>/.assayer/reports/<timestamp>)")
  .option("--fail-on <severity>", "exit 1 when any issue is at or above this severity")
  .option("--concurrency <n>", "worker count (0 uses --concurrency-percent)")
  .option("--concurrency-percent <pct>", "percentage of CPUs to use as workers")
  .option("--timeout <duration>", "per-category timeout, e.g. 90s or 5m")
  .option("--total-timeout <duration>", "timeout for the whole run")
  .option("--include <globs>", "comma-separated globs of files to include")
  .option("--exclude <globs>", "comma-separated globs of files to exclude")
  .option("--no-ignore", "do not apply .gitignore and .assayerignore")
  .option("--priority <list>", "priority overrides, e.g. security=1,format=lowest")
  .option("--track-suppressions", "collect inline suppression comments")
  .option("--extended", "add the execution workplan to the report")
  .option("--config <path>", "config file (default: <target>/.assayer/assess.json)")
  .option("--no-animation", "disable animated output")
  .option("--verbose", "mirror log lines to stderr")
  .action(async (target: string, options: AssessCliOptions) => {
    process.exitCode = await assessCommand(target, options);
  });

const hooks = program.command("hooks").description("Run hook commands from .assayer/hooks.json");

hooks
  .command("run")
  .description("Run every command of one hook in priority order")
  .argument("<hook>", "hook name, e.g. pre-commit")
  .argument("[target]", "repository directory", ".")
  .option("--manifest <path>", "hooks manifest (default: <target>/.assayer/hooks.json)")
  .option("--config <path>", "assessment config used by internal commands")
  .option("--no-animation", "disable animated output")
  .option("--verbose", "log each command")
  .action(async (hook: string, target: string, options: HooksCliOptions) => {
    process.exitCode = await hooksRunCommand(hook, target, options);
  });

program
  .command("report")
  .description("Render a saved report.json")
  .argument("<file>", "report.json or the directory that holds it")
  .option("--md", "print the markdown report instead of the summary")
  .option("--fail-on <severity>", "re-evaluate the fail-on threshold")
  .action(async (file: string, options: ReportCliOptions) => {
    process.exitCode = await reportCommand(file, options);
  });

program
  .command("doctor")
  .description("Show which assessment tools are installed")
  .action(async () => {
    process.exitCode = await doctorCommand();
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // Help and version exit cleanly; anything else is a usage error commander already printed.
    process.exitCode = error.exitCode === 0 ? 0 : EXIT_CONFIG_ERROR;
    return;
  }
  process.stderr.write(`[${TOOL_NAME}] ${errorMessage(error)}\n`);
  process.exitCode = error instanceof ConfigError || error instanceof ReportParseError ? EXIT_CONFIG_ERROR : EXIT_FAIL_ON;
});
