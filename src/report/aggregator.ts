import { getConfig } from "../config.js";
import type { TaskOutcome } from "../executor/types.js";
import { formatDuration } from "./format.js";

export type RunSummary = {
  total: number;
  succeeded: number;
  failed: number;
  durationMs: number;
  /** Failed outcomes, in the order they were collected. */
  failures: TaskOutcome[];
};

export type RenderOptions = {
  nameWidth?: number;
  ruleWidth?: number;
};

export function summarize(outcomes: readonly TaskOutcome[], durationMs: number): RunSummary {
  const failures = outcomes.filter((o) => !o.success);
  return {
    total: outcomes.length,
    succeeded: outcomes.length - failures.length,
    failed: failures.length,
    durationMs,
    failures,
  };
}

/** 0 when nothing failed (an empty run included), 1 otherwise. */
export function exitCodeFor(summary: RunSummary): 0 | 1 {
  return summary.failed > 0 ? 1 : 0;
}

export function renderSummary(summary: RunSummary, outcomes: readonly TaskOutcome[], opts?: RenderOptions): string[] {
  const config = getConfig().report;
  const nameWidth = opts?.nameWidth ?? config.nameWidth;
  const ruleWidth = opts?.ruleWidth ?? config.ruleWidth;
  const heavy = "=".repeat(ruleWidth);
  const light = "-".repeat(ruleWidth);

  const lines = ["", heavy, `Execution Summary (Total time: ${formatDuration(summary.durationMs)})`, heavy];

  for (const outcome of outcomes) {
    const name = outcome.name.padEnd(nameWidth);
    const duration = formatDuration(outcome.durationMs);
    lines.push(outcome.success ? `✓ ${name} - ${duration}` : `✗ ${name} - ${duration} (ERROR)`);
  }

  lines.push(light, `Results: ${summary.succeeded} successful, ${summary.failed} failed`);

  if (summary.failures.length > 0) {
    lines.push("", "Failed Tasks Details:", light);
    for (const failure of summary.failures) {
      lines.push("", `${failure.name}:`, `Error: ${failure.error?.message ?? "unknown error"}`);
      if (failure.output.length > 0) {
        lines.push("Output:", failure.output.trimEnd());
      }
    }
  }

  return lines;
}
