import type { z } from "zod";
import { ToolExecutionError } from "../errors.js";
import { execWithLimit, type ExecResult } from "../utils/exec.js";
import { commandExists } from "../utils/fs.js";
import { formatDuration } from "../utils/time.js";
import type { AdapterContext } from "./types.js";

const MAX_TOOL_OUTPUT_CHARS = 8_000_000;

export interface ToolInvocation {
  tool: string;
  command: string;
  args: string[];
  maxOutputChars?: number;
}

/**
 * Runs a tool under the adapter's timeout and the category's signal. Any exit code is
 * returned as-is; linters exit non-zero when they have findings. Failing to start,
 * timing out, being cancelled or overflowing the output limit throws.
 */
export async function runTool(
  invocation: ToolInvocation,
  context: AdapterContext,
  signal: AbortSignal,
): Promise<ExecResult> {
  const { tool, command, args } = invocation;
  const maxOutputChars = invocation.maxOutputChars ?? MAX_TOOL_OUTPUT_CHARS;
  if (!commandExists(command, context.env)) {
    throw new ToolExecutionError(tool, "launch", `${command} not found on PATH`);
  }

  const result = await execWithLimit(command, args, {
    cwd: context.rootDir,
    timeoutMs: context.timeoutMs,
    maxOutputChars,
    env: context.env,
    signal,
  });

  if (result.cancelled) {
    throw new ToolExecutionError(tool, "cancelled", `${tool} cancelled`);
  }
  if (result.timedOut) {
    throw new ToolExecutionError(tool, "timeout", `${tool} timed out after ${formatDuration(context.timeoutMs)}`);
  }
  if (result.spawnError) {
    throw new ToolExecutionError(tool, "launch", `${tool} failed to start: ${result.spawnError}`);
  }
  // A cut-off report would drop findings silently.
  if (result.truncated) {
    throw new ToolExecutionError(tool, "parse", `${tool} output exceeded ${maxOutputChars} characters`);
  }
  return result;
}

/** Like `runTool`, for fix passes whose output is not parsed; a non-zero exit is a failure. */
export async function runToolExpectSuccess(
  invocation: ToolInvocation,
  context: AdapterContext,
  signal: AbortSignal,
): Promise<ExecResult> {
  const result = await runTool(invocation, context, signal);
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim().split("\n").slice(-1)[0] || `exit code ${result.exitCode}`;
    throw new ToolExecutionError(invocation.tool, "launch", `${invocation.command} ${invocation.args[0] ?? ""} failed: ${detail}`);
  }
  return result;
}

function tryJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Tries each schema in order against the whole output as one JSON document.
 * Returns null when the text is not JSON or no schema accepts it.
 */
export function parseJsonDocument<T>(text: string, shapes: readonly z.ZodType<T, z.ZodTypeDef, unknown>[]): T | null {
  const parsed = tryJson(text.trim());
  if (!parsed.ok) return null;
  for (const shape of shapes) {
    const result = shape.safeParse(parsed.value);
    if (result.success) return result.data;
  }
  return null;
}

/** Newline-delimited JSON; lines that are not JSON or fail the schema are skipped. */
export function parseJsonLines<T>(text: string, shape: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  const items: T[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line.startsWith("{")) continue;
    const parsed = tryJson(line);
    if (!parsed.ok) continue;
    const result = shape.safeParse(parsed.value);
    if (result.success) items.push(result.data);
  }
  return items;
}

export function parseError(tool: string, detail: string): ToolExecutionError {
  return new ToolExecutionError(tool, "parse", `failed to parse ${tool} output: ${detail}`);
}
