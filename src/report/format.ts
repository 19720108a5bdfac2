import type { TaskDescriptor } from "../catalog/types.js";
import type { TaskOutcome } from "../executor/types.js";
import type { ProgressSnapshot, SchedulePolicy } from "../scheduler/types.js";

export function formatDuration(ms: number): string {
  if (ms < 1_000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1_000).toFixed(2)}s`;
  const minutes = Math.floor(ms / 60_000);
  return `${minutes}m${((ms - minutes * 60_000) / 1_000).toFixed(1)}s`;
}

export function formatPercent(completed: number, total: number): string {
  const pct = total === 0 ? 100 : (completed / total) * 100;
  return `${pct.toFixed(1)}%`;
}

export function formatCounter(completed: number, total: number): string {
  return `[${completed}/${total} - ${formatPercent(completed, total)}]`;
}

export function runStartLine(total: number, policy: SchedulePolicy): string {
  return `Starting ${policy} execution of ${total} task${total === 1 ? "" : "s"}...`;
}

export function taskStartLine(task: TaskDescriptor, position: number, total: number, policy: SchedulePolicy): string {
  return policy === "sequential" ? `${formatCounter(position, total)} Starting ${task.name}...` : `Starting ${task.name}...`;
}

export function taskEndLine(outcome: TaskOutcome, progress: ProgressSnapshot): string {
  const counter = formatCounter(progress.completed, progress.total);
  const duration = formatDuration(outcome.durationMs);
  return outcome.error
    ? `✗ ${outcome.name} failed in ${duration}: ${outcome.error.message} ${counter}`
    : `✓ ${outcome.name} completed in ${duration} ${counter}`;
}

export function progressLine(progress: ProgressSnapshot): string {
  return `Progress update: ${progress.completed}/${progress.total} completed (${formatPercent(progress.completed, progress.total)}) - Elapsed: ${formatDuration(progress.elapsedMs)}`;
}
