import { EXIT_OK } from "../assess/failOn.js";
import { printDoctorChecks } from "../output/console.js";
import { DEFAULT_CATEGORY_SETUP } from "../runners/defaults.js";
import type { DoctorCheck } from "../types.js";
import { configureUi, getUiRuntime } from "../ui/runtime.js";
import { execWithLimit } from "../utils/exec.js";
import { commandExists } from "../utils/fs.js";
import { nowIso } from "../utils/time.js";
import { TOOL_NAME, TOOL_VERSION } from "../version.js";

/** One row per adapter; a binary shared by several adapters is queried once. */
export async function collectDoctorChecks(env: NodeJS.ProcessEnv = process.env): Promise<DoctorCheck[]> {
  const versions = new Map<string, string | null>();
  const checks: DoctorCheck[] = [];

  for (const setup of DEFAULT_CATEGORY_SETUP) {
    for (const definition of setup.definitions) {
      if (!versions.has(definition.binary)) {
        versions.set(definition.binary, await readVersion(definition.binary, env));
      }
      const version = versions.get(definition.binary) ?? null;
      checks.push({
        tool: definition.name,
        category: setup.category,
        available: version !== null,
        note: version ?? `${definition.binary} not found on PATH`,
      });
    }
  }
  return checks;
}

async function readVersion(binary: string, env: NodeJS.ProcessEnv): Promise<string | null> {
  if (!commandExists(binary, env)) {
    return null;
  }
  const args = binary === "cargo" ? ["clippy", "--version"] : ["--version"];
  const result = await execWithLimit(binary, args, {
    cwd: process.cwd(),
    timeoutMs: 8000,
    maxOutputChars: 4000,
    env,
  });
  if (result.spawnError) {
    return null;
  }
  const raw = `${result.stdout}\n${result.stderr}`.trim();
  return raw.split(/\r?\n/)[0] || "available";
}

export async function doctorCommand(): Promise<number> {
  configureUi({ animation: false });
  const ui = getUiRuntime();
  ui.renderer.section(`${TOOL_NAME} ${TOOL_VERSION} doctor - ${nowIso()}`);
  const checks = await collectDoctorChecks();
  printDoctorChecks(ui, checks);

  const missing = checks.filter((check) => !check.available).map((check) => check.tool);
  if (missing.length > 0) {
    ui.renderer.line(ui.theme.colors.warn(`Categories using ${missing.join(", ")} will be skipped or partial.`));
  }
  return EXIT_OK;
}
