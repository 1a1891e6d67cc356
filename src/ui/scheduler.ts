export interface SchedulerConfig {
  /** Shortest time a stage line stays on screen when animations run. */
  minStageMs?: number;
  /** Total padding one run may add across all stages. */
  maxPaddingMs?: number;
  reducedMotion?: boolean;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface PaddingResult {
  actualMs: number;
  paddingMs: number;
  visibleMs: number;
}

export function computePadding(input: {
  actualMs: number;
  minVisibleMs: number;
  remainingBudgetMs: number;
  reducedMotion: boolean;
}): number {
  if (input.reducedMotion) {
    return 0;
  }
  const needed = input.minVisibleMs - input.actualMs;
  if (needed <= 0) {
    return 0;
  }
  return Math.max(0, Math.min(needed, input.remainingBudgetMs));
}

/**
 * Keeps fast stages visible long enough to read on an interactive terminal, within a
 * fixed budget per run so padding never dominates a real assessment.
 */
export class AnimationScheduler {
  readonly minStageMs: number;
  readonly maxPaddingMs: number;
  private readonly reducedMotion: boolean;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private usedMs = 0;

  constructor(config: SchedulerConfig = {}) {
    this.minStageMs = config.minStageMs ?? 250;
    this.maxPaddingMs = config.maxPaddingMs ?? 800;
    this.reducedMotion = Boolean(config.reducedMotion);
    this.sleepFn = config.sleep || defaultSleep;
    this.now = config.now || Date.now;
  }

  resetRun(): void {
    this.usedMs = 0;
  }

  get usedPaddingMs(): number {
    return this.usedMs;
  }

  get remainingPaddingMs(): number {
    return Math.max(0, this.maxPaddingMs - this.usedMs);
  }

  timestamp(): number {
    return this.now();
  }

  async padStage(actualMs: number, minVisibleMs = this.minStageMs): Promise<PaddingResult> {
    const paddingMs = computePadding({
      actualMs,
      minVisibleMs,
      remainingBudgetMs: this.remainingPaddingMs,
      reducedMotion: this.reducedMotion,
    });

    if (paddingMs > 0) {
      this.usedMs += paddingMs;
      await this.sleepFn(paddingMs);
    }

    return { actualMs, paddingMs, visibleMs: actualMs + paddingMs };
  }

  async padSince(startedAtMs: number, minVisibleMs = this.minStageMs): Promise<PaddingResult> {
    return this.padStage(Math.max(0, this.now() - startedAtMs), minVisibleMs);
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
