import type { TaskDescriptor } from "../catalog/types.js";
import type { TaskOutcome } from "../executor/types.js";

export type SchedulePolicy = "sequential" | "parallel";

export type ProgressSnapshot = {
  completed: number;
  total: number;
  elapsedMs: number;
};

export type ScheduleCallbacks = {
  /** `position` is the 1-based launch order. */
  onTaskStart?: (task: TaskDescriptor, position: number, total: number) => void;
  onTaskEnd?: (outcome: TaskOutcome, progress: ProgressSnapshot) => void;
  /** Periodic snapshot while a parallel run is in flight. */
  onProgress?: (progress: ProgressSnapshot) => void;
};

export type ScheduleOptions = {
  policy?: SchedulePolicy;
  /** Parallel only. 0 starts every task at once. */
  maxConcurrency?: number;
  /** Parallel only. 0 disables periodic progress. */
  progressIntervalMs?: number;
  callbacks?: ScheduleCallbacks;
};

export type ScheduleResult = {
  /** Catalog order for sequential runs, completion order for parallel runs. */
  outcomes: TaskOutcome[];
  durationMs: number;
};
