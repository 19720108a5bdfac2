import type { TaskDescriptor } from "../catalog/types.js";

export type OutputMode = "streamed" | "buffered";

export type TaskFailure =
  | { kind: "exit"; message: string; exitCode: number }
  | { kind: "signal"; message: string; signal: string }
  | { kind: "launch"; message: string; code?: string }
  | { kind: "timeout"; message: string; timeoutMs: number };

export type TaskOutcome = {
  readonly name: string;
  readonly success: boolean;
  readonly durationMs: number;
  readonly error?: TaskFailure;
  /** Combined stdout and stderr in buffered mode, empty when streamed. */
  readonly output: string;
};

/** Runs one task to completion. Resolves for every task-level failure; a rejection is a harness fault. */
export type TaskRunner = (task: TaskDescriptor) => Promise<TaskOutcome>;
