import { resolve } from "node:path";
import { resolveCatalog } from "./catalog/resolver.js";
import type { ResolvedCatalog, TaskDescriptor } from "./catalog/types.js";
import { getConfig } from "./config.js";
import { HarnessError } from "./errors.js";
import { ProcessRunner, type ProcessRunnerOptions } from "./executor/process-runner.js";
import type { TaskOutcome, TaskRunner } from "./executor/types.js";
import { exitCodeFor, summarize, type RunSummary } from "./report/aggregator.js";
import { Scheduler } from "./scheduler/scheduler.js";
import type { ScheduleCallbacks, SchedulePolicy } from "./scheduler/types.js";
import { log } from "./utils/logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RunOptions = Omit<ProcessRunnerOptions, "timeoutMs"> & {
  /** Directory catalog entries are resolved against (default: cwd). */
  baseDir?: string;
  policy?: SchedulePolicy;
  maxConcurrency?: number;
  progressIntervalMs?: number;
  taskTimeoutMs?: number;
};

export type RunCallbacks = ScheduleCallbacks & {
  onRunStart?: (tasks: readonly TaskDescriptor[], policy: SchedulePolicy) => void;
};

export type RunReport = {
  tasks: TaskDescriptor[];
  missing: string[];
  outcomes: TaskOutcome[];
  summary: RunSummary;
  exitCode: 0 | 1;
};

export type HarnessOptions = {
  /** Replace the child-process runner (for testing). Runner options in `RunOptions` are then unused. */
  runner?: TaskRunner;
};

// ---------------------------------------------------------------------------
// Harness
// ---------------------------------------------------------------------------

export class Harness {
  private runner?: TaskRunner;

  constructor(opts?: HarnessOptions) {
    this.runner = opts?.runner;
  }

  /**
   * Resolve catalog entries against `baseDir` without running anything. A
   * base directory that does not exist leaves every entry missing.
   */
  async resolve(entries: readonly string[], baseDir = "."): Promise<ResolvedCatalog> {
    return resolveCatalog(resolve(baseDir), entries);
  }

  async run(entries: readonly string[], opts?: RunOptions, callbacks?: RunCallbacks): Promise<RunReport> {
    const policy = opts?.policy ?? getConfig().scheduler.policy;
    const { tasks, missing } = await this.resolve(entries, opts?.baseDir);

    log.debug("Catalog resolved", { resolved: tasks.length, missing: missing.length });
    callbacks?.onRunStart?.(tasks, policy);

    const runner =
      this.runner ??
      new ProcessRunner({
        interpreter: opts?.interpreter,
        mode: opts?.mode,
        timeoutMs: opts?.taskTimeoutMs,
        killGraceMs: opts?.killGraceMs,
        stdout: opts?.stdout,
        stderr: opts?.stderr,
      }).run;

    const { outcomes, durationMs } = await new Scheduler(runner).run(tasks, {
      policy,
      maxConcurrency: opts?.maxConcurrency,
      progressIntervalMs: opts?.progressIntervalMs,
      callbacks,
    });

    if (outcomes.length !== tasks.length) {
      throw new HarnessError("INCOMPLETE_RUN", `Expected ${tasks.length} outcomes, got ${outcomes.length}`);
    }

    const summary = summarize(outcomes, durationMs);
    return { tasks, missing, outcomes, summary, exitCode: exitCodeFor(summary) };
  }
}
