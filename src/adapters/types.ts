import type { AssessmentCategory, AssessmentMode, Issue, Suppression } from "../types.js";

/** What an adapter knows about the run it belongs to. */
export interface AdapterContext {
  rootDir: string;
  /** Repository-relative POSIX paths, already filtered by ignore and include/exclude rules. */
  files: string[];
  mode: AssessmentMode;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
}

export interface ToolAdapter {
  readonly name: string;
  readonly category: AssessmentCategory;
  /** PATH lookup and manifest check only. */
  isAvailable(): boolean;
  run(signal: AbortSignal): Promise<Issue[]>;
}

export interface SuppressionScan {
  issues: Issue[];
  suppressions: Suppression[];
}

export interface SuppressingToolAdapter extends ToolAdapter {
  runWithSuppressions(signal: AbortSignal): Promise<SuppressionScan>;
}

export function supportsSuppressions(adapter: ToolAdapter): adapter is SuppressingToolAdapter {
  return "runWithSuppressions" in adapter && typeof adapter.runWithSuppressions === "function";
}

/** Registered with a category runner; builds adapters once the run's file list is known. */
export interface AdapterDefinition {
  name: string;
  /** Binary looked up on PATH to decide whether the category is worth scheduling. */
  binary: string;
  /** The binary may be installed inside the target (node_modules/.bin), so PATH alone does not decide. */
  projectLocal?: boolean;
  create(context: AdapterContext): ToolAdapter;
}
