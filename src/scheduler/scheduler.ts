import type { TaskDescriptor } from "../catalog/types.js";
import { getConfig } from "../config.js";
import type { TaskOutcome, TaskRunner } from "../executor/types.js";
import { ProgressReporter } from "../progress/reporter.js";
import { log } from "../utils/logger.js";
import { CompletionCounter } from "./completion-counter.js";
import type { ScheduleCallbacks, ScheduleOptions, ScheduleResult } from "./types.js";

export class Scheduler {
  private runner: TaskRunner;

  constructor(runner: TaskRunner) {
    this.runner = runner;
  }

  async run(tasks: readonly TaskDescriptor[], opts?: ScheduleOptions): Promise<ScheduleResult> {
    const config = getConfig().scheduler;
    const policy = opts?.policy ?? config.policy;
    const callbacks = opts?.callbacks ?? {};

    log.debug(`Scheduling ${tasks.length} task(s)`, { policy });

    if (policy === "sequential") {
      return this.runSequential(tasks, callbacks);
    }
    return this.runParallel(tasks, {
      maxConcurrency: opts?.maxConcurrency ?? config.maxConcurrency,
      progressIntervalMs: opts?.progressIntervalMs ?? config.progressIntervalMs,
      callbacks,
    });
  }

  private async runSequential(tasks: readonly TaskDescriptor[], callbacks: ScheduleCallbacks): Promise<ScheduleResult> {
    const start = Date.now();
    const counter = new CompletionCounter(tasks.length);
    const outcomes: TaskOutcome[] = [];

    for (const [index, task] of tasks.entries()) {
      callbacks.onTaskStart?.(task, index + 1, tasks.length);
      const outcome = await this.runner(task);
      outcomes.push(outcome);
      callbacks.onTaskEnd?.(outcome, {
        completed: counter.increment(),
        total: tasks.length,
        elapsedMs: Date.now() - start,
      });
    }

    return { outcomes, durationMs: Date.now() - start };
  }

  private async runParallel(
    tasks: readonly TaskDescriptor[],
    opts: { maxConcurrency: number; progressIntervalMs: number; callbacks: ScheduleCallbacks },
  ): Promise<ScheduleResult> {
    const start = Date.now();
    const { callbacks } = opts;
    const counter = new CompletionCounter(tasks.length);
    // Completion channel: appended to in the order tasks finish.
    const outcomes: TaskOutcome[] = [];
    const reporter = callbacks.onProgress
      ? new ProgressReporter({
          counter,
          intervalMs: opts.progressIntervalMs,
          onProgress: callbacks.onProgress,
          startedAt: start,
        })
      : null;

    const width = opts.maxConcurrency > 0 ? Math.min(opts.maxConcurrency, tasks.length) : tasks.length;
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < tasks.length) {
        const position = next + 1;
        const task = tasks[next];
        next += 1;
        callbacks.onTaskStart?.(task, position, tasks.length);
        const outcome = await this.runner(task);
        outcomes.push(outcome);
        callbacks.onTaskEnd?.(outcome, {
          completed: counter.increment(),
          total: tasks.length,
          elapsedMs: Date.now() - start,
        });
      }
    };

    reporter?.start();
    try {
      await Promise.all(Array.from({ length: width }, () => worker()));
    } finally {
      reporter?.stop();
    }

    return { outcomes, durationMs: Date.now() - start };
  }
}
