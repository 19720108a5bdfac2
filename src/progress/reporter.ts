import type { CompletionView } from "../scheduler/completion-counter.js";
import type { ProgressSnapshot } from "../scheduler/types.js";

export type ProgressReporterOptions = {
  counter: CompletionView;
  intervalMs: number;
  onProgress: (progress: ProgressSnapshot) => void;
  /** Epoch ms the elapsed time is measured from (default: when `start` is called). */
  startedAt?: number;
};

/**
 * Periodic observer of a parallel run. Each tick reads the completion
 * counter; once it has reached the total the reporter stops itself.
 */
export class ProgressReporter {
  private counter: CompletionView;
  private intervalMs: number;
  private onProgress: (progress: ProgressSnapshot) => void;
  private startedAt?: number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(opts: ProgressReporterOptions) {
    this.counter = opts.counter;
    this.intervalMs = opts.intervalMs;
    this.onProgress = opts.onProgress;
    this.startedAt = opts.startedAt;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer || this.intervalMs <= 0 || this.counter.isDone()) return;
    const startedAt = this.startedAt ?? Date.now();
    this.startedAt = startedAt;
    this.timer = setInterval(() => this.tick(startedAt), this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  private tick(startedAt: number): void {
    if (this.counter.isDone()) {
      this.stop();
      return;
    }
    this.onProgress({
      completed: this.counter.completed,
      total: this.counter.total,
      elapsedMs: Date.now() - startedAt,
    });
  }
}
