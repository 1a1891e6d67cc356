import { HookCommandError, errorMessage } from "../errors.js";
import type { Logger } from "../types.js";
import { execWithLimit } from "../utils/exec.js";
import { createSilentLogger } from "../utils/logger.js";
import { MAX_TIMER_MS, formatDuration, parseDuration } from "../utils/time.js";

export const DEFAULT_HOOK_TIMEOUT_MS = 2 * 60_000;

export const INTERNAL_COMMANDS = ["assess", "format", "lint", "security", "dependencies", "validate"] as const;

export interface HookCommand {
  command: string;
  args: string[];
  priority: number;
  timeout?: string;
  /** Command line tried once when the command fails; the hook continues if it succeeds. */
  fallback?: string;
}

export type InternalCommandHandler = (signal: AbortSignal, command: string, args: string[]) => Promise<void>;

export interface HookExecutorOptions {
  workDir: string;
  verbose?: boolean;
  logger?: Logger;
  internalHandler?: InternalCommandHandler;
  /** How internal commands are launched when no handler is injected. */
  selfCommand?: { command: string; args: string[] };
  /** Stream child output to this terminal (default) or capture it. */
  streamOutput?: boolean;
}

export function isInternalCommand(command: string): boolean {
  return INTERNAL_COMMANDS.some((name) => name === command);
}

export function formatHookCommand(command: Pick<HookCommand, "command" | "args">): string {
  return command.args.length ? `${command.command} ${command.args.join(" ")}` : command.command;
}

export class HookExecutor {
  private readonly options: HookExecutorOptions;
  private readonly logger: Logger;

  constructor(options: HookExecutorOptions) {
    this.options = options;
    this.logger = options.logger ?? createSilentLogger();
  }

  /** Lower priority first, manifest order on ties; stops at the first failing command. */
  async executeHookCommands(commands: readonly HookCommand[], signal?: AbortSignal): Promise<void> {
    if (commands.length === 0) {
      await this.logger.debug("hooks", "no commands to execute");
      return;
    }

    // Array.prototype.sort is stable, so equal priorities keep manifest order.
    const sorted = [...commands].sort((a, b) => a.priority - b.priority);
    await this.progress(`executing ${sorted.length} command(s)`);

    for (const [index, command] of sorted.entries()) {
      const label = formatHookCommand(command);
      await this.progress(`[${index + 1}/${sorted.length}] running: ${label}`);
      try {
        await this.executeCommand(command, signal);
      } catch (error) {
        if (!command.fallback || signal?.aborted) {
          await this.logger.error("hooks", `command failed: ${label}: ${errorMessage(error)}`);
          throw error;
        }
        await this.logger.warn("hooks", `command failed: ${label}; trying fallback: ${command.fallback}`);
        const [fallbackCommand, ...fallbackArgs] = command.fallback.trim().split(/\s+/);
        await this.executeCommand({ ...command, command: fallbackCommand, args: fallbackArgs, fallback: undefined }, signal);
      }
      await this.progress(`[${index + 1}/${sorted.length}] completed: ${command.command}`);
    }

    await this.progress("all commands completed successfully");
  }

  private async progress(message: string): Promise<void> {
    if (this.options.verbose) {
      await this.logger.info("hooks", message);
    } else {
      await this.logger.debug("hooks", message);
    }
  }

  private async resolveTimeout(command: HookCommand): Promise<number> {
    if (!command.timeout) {
      return DEFAULT_HOOK_TIMEOUT_MS;
    }
    const parsed = parseDuration(command.timeout);
    if (parsed === null || parsed <= 0 || parsed > MAX_TIMER_MS) {
      await this.logger.warn(
        "hooks",
        `invalid timeout "${command.timeout}", using default ${formatDuration(DEFAULT_HOOK_TIMEOUT_MS)}`,
      );
      return DEFAULT_HOOK_TIMEOUT_MS;
    }
    return parsed;
  }

  private async executeCommand(command: HookCommand, signal?: AbortSignal): Promise<void> {
    const timeoutMs = await this.resolveTimeout(command);
    const label = formatHookCommand(command);

    if (isInternalCommand(command.command) && this.options.internalHandler) {
      await this.logger.debug("hooks", `routing internal command "${command.command}" to handler`);
      await this.runInternal(command, timeoutMs, signal);
      return;
    }

    let executable = command.command;
    let args = command.args;
    if (isInternalCommand(command.command)) {
      const self = this.options.selfCommand ?? { command: "assayer", args: [] };
      await this.logger.warn("hooks", `no internal handler for "${command.command}", running ${self.command} ${command.command}`);
      executable = self.command;
      args = [...self.args, command.command, ...command.args];
    }

    const result = await execWithLimit(executable, args, {
      cwd: this.options.workDir,
      timeoutMs,
      maxOutputChars: 20_000,
      signal,
      inheritStdio: this.options.streamOutput ?? true,
    });

    if (result.timedOut) {
      throw new HookCommandError(command.command, result.exitCode, `${label}: command timed out after ${formatDuration(timeoutMs)}`);
    }
    if (result.cancelled) {
      throw new HookCommandError(command.command, result.exitCode, `${label}: cancelled`);
    }
    if (result.spawnError) {
      throw new HookCommandError(command.command, result.exitCode, `${label}: ${result.spawnError}`);
    }
    if (result.exitCode !== 0) {
      throw new HookCommandError(command.command, result.exitCode, `${label}: exited with code ${result.exitCode}`);
    }
  }

  private async runInternal(command: HookCommand, timeoutMs: number, signal?: AbortSignal): Promise<void> {
    const handler = this.options.internalHandler;
    if (!handler) return;

    const controller = new AbortController();
    const forward = (): void => controller.abort(signal?.reason);
    signal?.addEventListener("abort", forward, { once: true });
    const timer = setTimeout(() => controller.abort(new Error("timeout")), timeoutMs);
    const label = formatHookCommand(command);

    try {
      await new Promise<void>((resolve, reject) => {
        controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
        void handler(controller.signal, command.command, command.args).then(resolve, reject);
      });
    } catch (error) {
      if (controller.signal.aborted && !signal?.aborted) {
        throw new HookCommandError(command.command, null, `${label}: command timed out after ${formatDuration(timeoutMs)}`);
      }
      if (error instanceof HookCommandError) throw error;
      throw new HookCommandError(command.command, null, `${label}: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forward);
    }
  }
}
