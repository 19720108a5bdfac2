import { getConfig } from "../config.js";
import type { RunCallbacks } from "../harness.js";
import type { OutputMode } from "../executor/types.js";
import type { SchedulePolicy } from "../scheduler/types.js";
import { log } from "../utils/logger.js";
import { progressLine, runStartLine, taskEndLine, taskStartLine } from "./format.js";

export type LineWriter = (line: string) => void;

/** Callbacks that print the live part of the console protocol, one line per event. */
export function createConsoleCallbacks(policy: SchedulePolicy, write: LineWriter = console.log): RunCallbacks {
  return {
    onRunStart(tasks, runPolicy) {
      write(runStartLine(tasks.length, runPolicy));
      write("=".repeat(getConfig().report.ruleWidth));
    },
    onTaskStart(task, position, total) {
      write(taskStartLine(task, position, total, policy));
    },
    onTaskEnd(outcome, progress) {
      if (outcome.error) {
        log.debug(`Task "${outcome.name}" failed`, { kind: outcome.error.kind });
      }
      write(taskEndLine(outcome, progress));
    },
    onProgress(progress) {
      write("");
      write(progressLine(progress));
    },
  };
}

/** Streamed output of more than one task in flight ends up interleaved on the console. */
export function outputWillInterleave(
  policy: SchedulePolicy,
  mode: OutputMode,
  maxConcurrency: number = getConfig().scheduler.maxConcurrency,
): boolean {
  return policy === "parallel" && mode === "streamed" && maxConcurrency !== 1;
}
