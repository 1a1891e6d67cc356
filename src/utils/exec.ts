import { spawn } from "node:child_process";
import { MAX_TIMER_MS } from "./time.js";

export interface ExecOptions {
  cwd: string;
  timeoutMs: number;
  maxOutputChars: number;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  /** Stream child output to this process instead of capturing it. */
  inheritStdio?: boolean;
}

export interface ExecResult {
  command: string;
  args: string[];
  cwd: string;
  durationMs: number;
  exitCode: number | null;
  timedOut: boolean;
  cancelled: boolean;
  spawnError?: string;
  stdout: string;
  stderr: string;
  /** Output passed `maxOutputChars`; only its tail was kept. */
  truncated: boolean;
}

const KILL_GRACE_MS = 1500;

export async function execWithLimit(
  command: string,
  args: string[],
  options: ExecOptions,
): Promise<ExecResult> {
  const started = Date.now();
  let stdout = "";
  let stderr = "";
  let timedOut = false;
  let cancelled = false;
  let truncated = false;
  let spawnError: string | undefined;

  return new Promise<ExecResult>((resolve) => {
    if (options.signal?.aborted) {
      resolve({
        command,
        args,
        cwd: options.cwd,
        durationMs: 0,
        exitCode: null,
        timedOut: false,
        cancelled: true,
        stdout,
        stderr,
        truncated,
      });
      return;
    }

    const useGroup = process.platform !== "win32";
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      shell: false,
      detached: useGroup,
      stdio: options.inheritStdio ? ["ignore", "inherit", "inherit"] : ["ignore", "pipe", "pipe"],
    });

    const trim = (value: string): string => {
      if (value.length <= options.maxOutputChars) {
        return value;
      }
      truncated = true;
      return value.slice(value.length - options.maxOutputChars);
    };

    child.stdout?.on("data", (chunk: Buffer) => {
      stdout = trim(stdout + chunk.toString("utf8"));
    });

    child.stderr?.on("data", (chunk: Buffer) => {
      stderr = trim(stderr + chunk.toString("utf8"));
    });

    // Signal the whole process group so tools that fork workers stop too.
    const killTree = (signal: NodeJS.Signals): void => {
      if (child.exitCode !== null || child.signalCode !== null) return;
      try {
        if (useGroup && child.pid !== undefined) {
          process.kill(-child.pid, signal);
        } else {
          child.kill(signal);
        }
      } catch {
        child.kill(signal);
      }
    };

    let graceTimer: NodeJS.Timeout | undefined;
    const terminate = (): void => {
      killTree("SIGTERM");
      graceTimer = setTimeout(() => killTree("SIGKILL"), KILL_GRACE_MS);
      graceTimer.unref();
    };

    // A zero timeout means the caller's signal is the only limit.
    const timer =
      options.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            terminate();
          }, Math.min(options.timeoutMs, MAX_TIMER_MS))
        : undefined;

    const onAbort = (): void => {
      cancelled = true;
      terminate();
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    let settled = false;
    const finalize = (exitCode: number | null) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
      resolve({
        command,
        args,
        cwd: options.cwd,
        durationMs: Date.now() - started,
        exitCode,
        timedOut,
        cancelled,
        spawnError,
        stdout,
        stderr,
        truncated,
      });
    };

    child.on("error", (error) => {
      spawnError = error.message;
      stderr = `${stderr}\n${String(error)}`.trim();
      finalize(-1);
    });

    child.on("close", (code) => finalize(code));
  });
}
