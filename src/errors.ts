export type ToolFailureKind = "launch" | "parse" | "timeout" | "cancelled";

/** A wrapped tool could not produce findings: it did not start, its output was unreadable, or it was stopped. */
export class ToolExecutionError extends Error {
  readonly tool: string;
  readonly kind: ToolFailureKind;

  constructor(tool: string, kind: ToolFailureKind, message: string) {
    super(message);
    this.name = "ToolExecutionError";
    this.tool = tool;
    this.kind = kind;
  }
}

export class ConfigError extends Error {
  readonly file?: string;

  constructor(message: string, file?: string) {
    super(file ? `${file}: ${message}` : message);
    this.name = "ConfigError";
    this.file = file;
  }
}

export class HookCommandError extends Error {
  readonly command: string;
  readonly exitCode: number | null;

  constructor(command: string, exitCode: number | null, message: string) {
    super(message);
    this.name = "HookCommandError";
    this.command = command;
    this.exitCode = exitCode;
  }
}

export class ReportParseError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ReportParseError";
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
