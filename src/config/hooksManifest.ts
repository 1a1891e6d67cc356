import path from "node:path";
import { z } from "zod";
import type { HookCommand } from "../assess/hookExecutor.js";
import { ConfigError, errorMessage } from "../errors.js";
import { readTextIfExists } from "../utils/fs.js";
import { MAX_TIMER_MS, parseDuration } from "../utils/time.js";
import { CONFIG_DIR } from "./assessConfig.js";

export const HOOKS_FILE = "hooks.json";

const HookCommandSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    priority: z.number().int().default(0),
    timeout: z
      .string()
      .refine(
        (value) => {
          const parsed = parseDuration(value);
          return parsed !== null && parsed <= MAX_TIMER_MS;
        },
        { message: "invalid duration" },
      )
      .optional(),
    fallback: z.string().min(1).optional(),
  })
  .strict();

export const HooksManifestSchema = z.object({
  hooks: z.record(z.array(HookCommandSchema)),
});

export type HooksManifest = z.infer<typeof HooksManifestSchema>;

export function parseHooksManifest(text: string, source: string): HooksManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`invalid JSON: ${errorMessage(error)}`, source);
  }
  const parsed = HooksManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ConfigError(detail, source);
  }
  return parsed.data;
}

export async function loadHooksManifest(rootDir: string, explicitPath?: string): Promise<HooksManifest> {
  const file = explicitPath ? path.resolve(rootDir, explicitPath) : path.join(rootDir, CONFIG_DIR, HOOKS_FILE);
  const text = await readTextIfExists(file);
  if (text === null) {
    throw new ConfigError("hooks manifest not found", file);
  }
  return parseHooksManifest(text, file);
}

/** Commands for one hook; an unknown hook name is a configuration error. */
export function hookCommands(manifest: HooksManifest, hook: string): HookCommand[] {
  const commands = manifest.hooks[hook];
  if (!commands) {
    const known = Object.keys(manifest.hooks).sort();
    throw new ConfigError(`unknown hook "${hook}" (defined: ${known.length ? known.join(", ") : "none"})`);
  }
  return commands.map((entry) => ({ ...entry }));
}
