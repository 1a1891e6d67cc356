import { REPOSITORY_FILE, type Issue } from "../types.js";
import { commandExists } from "../utils/fs.js";
import { runTool } from "./toolExec.js";
import type { AdapterContext, AdapterDefinition, ToolAdapter } from "./types.js";

/** Tracked paths with staged or unstaged changes, from `git status --porcelain=v1`. */
export function parsePorcelainStatus(text: string): string[] {
  const changed: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    if (line.length < 4) continue;
    const code = line.slice(0, 2);
    if (code === "??" || code === "!!") continue;
    let file = line.slice(3);
    const arrow = file.indexOf(" -> ");
    if (arrow !== -1) file = file.slice(arrow + 4);
    changed.push(file.replace(/^"|"$/g, ""));
  }
  return changed;
}

function repositoryIssue(message: string, subCategory?: string): Issue {
  const issue: Issue = {
    file: REPOSITORY_FILE,
    severity: "high",
    message,
    category: "repo-status",
    autoFixable: false,
  };
  if (subCategory) issue.subCategory = subCategory;
  return issue;
}

export function gitStateIssues(changed: readonly string[]): Issue[] {
  if (changed.length === 0) return [];
  return [
    repositoryIssue(
      `Repository has ${changed.length} uncommitted change(s) (staged or unstaged); commit before pushing. Files: ${changed.join(", ")}`,
      "git-state",
    ),
  ];
}

export class GitStatusAdapter implements ToolAdapter {
  readonly name = "git-status";
  readonly category = "repo-status" as const;

  constructor(private readonly context: AdapterContext) {}

  isAvailable(): boolean {
    return commandExists("git", this.context.env);
  }

  async run(signal: AbortSignal): Promise<Issue[]> {
    if (this.context.mode === "no-op") {
      return [];
    }
    const result = await runTool(
      { tool: this.name, command: "git", args: ["status", "--porcelain=v1", "--untracked-files=no"] },
      this.context,
      signal,
    );
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim().split("\n")[0] || `exit code ${result.exitCode}`;
      return [repositoryIssue(`Failed to read git status: ${detail}`)];
    }
    return gitStateIssues(parsePorcelainStatus(result.stdout));
  }
}

export const gitStatusDefinition: AdapterDefinition = {
  name: "git-status",
  binary: "git",
  create: (context) => new GitStatusAdapter(context),
};
