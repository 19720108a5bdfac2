import { afterEach, describe, expect, it } from "vitest";
import { configure, resetConfig } from "../src/config.js";
import { createOutcome } from "../src/executor/process-runner.js";
import { createConsoleCallbacks, outputWillInterleave } from "../src/report/console.js";
import {
  formatCounter,
  formatDuration,
  formatPercent,
  progressLine,
  runStartLine,
  taskEndLine,
  taskStartLine,
} from "../src/report/format.js";
import { makeTask } from "./helpers.js";

describe("format helpers", () => {
  it("formats durations by magnitude", () => {
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(1_500)).toBe("1.50s");
    expect(formatDuration(61_500)).toBe("1m1.5s");
    expect(formatDuration(125_000)).toBe("2m5.0s");
  });

  it("formats percentages with one decimal", () => {
    expect(formatPercent(1, 3)).toBe("33.3%");
    expect(formatPercent(2, 2)).toBe("100.0%");
    expect(formatPercent(0, 0)).toBe("100.0%");
    expect(formatCounter(1, 4)).toBe("[1/4 - 25.0%]");
  });

  it("builds task lines", () => {
    const failed = createOutcome("b", 2_000, "", { kind: "exit", message: "exited with code 2", exitCode: 2 });

    expect(runStartLine(1, "parallel")).toBe("Starting parallel execution of 1 task...");
    expect(runStartLine(3, "sequential")).toBe("Starting sequential execution of 3 tasks...");
    expect(taskStartLine(makeTask("a"), 2, 4, "sequential")).toBe("[2/4 - 50.0%] Starting a...");
    expect(taskStartLine(makeTask("a"), 2, 4, "parallel")).toBe("Starting a...");
    expect(taskEndLine(createOutcome("a", 1_500, ""), { completed: 1, total: 2, elapsedMs: 1_500 })).toBe(
      "✓ a completed in 1.50s [1/2 - 50.0%]",
    );
    expect(taskEndLine(failed, { completed: 2, total: 2, elapsedMs: 2_000 })).toBe(
      "✗ b failed in 2.00s: exited with code 2 [2/2 - 100.0%]",
    );
    expect(progressLine({ completed: 2, total: 4, elapsedMs: 10_000 })).toBe(
      "Progress update: 2/4 completed (50.0%) - Elapsed: 10.00s",
    );
  });
});

describe("createConsoleCallbacks", () => {
  it("prints one line per event", () => {
    const lines: string[] = [];
    const callbacks = createConsoleCallbacks("sequential", (line) => lines.push(line));
    const [a, b] = [makeTask("a"), makeTask("b")];

    callbacks.onRunStart?.([a, b], "sequential");
    callbacks.onTaskStart?.(a, 1, 2);
    callbacks.onTaskEnd?.(createOutcome("a", 1_500, ""), { completed: 1, total: 2, elapsedMs: 1_500 });
    callbacks.onProgress?.({ completed: 1, total: 2, elapsedMs: 10_000 });

    expect(lines).toEqual([
      "Starting sequential execution of 2 tasks...",
      "=".repeat(60),
      "[1/2 - 50.0%] Starting a...",
      "✓ a completed in 1.50s [1/2 - 50.0%]",
      "",
      "Progress update: 1/2 completed (50.0%) - Elapsed: 10.00s",
    ]);
  });
});

describe("outputWillInterleave", () => {
  afterEach(() => resetConfig());

  it("flags streamed parallel runs with more than one task in flight", () => {
    expect(outputWillInterleave("parallel", "streamed", 0)).toBe(true);
    expect(outputWillInterleave("parallel", "streamed", 4)).toBe(true);
    expect(outputWillInterleave("parallel", "streamed", 1)).toBe(false);
    expect(outputWillInterleave("parallel", "buffered", 0)).toBe(false);
    expect(outputWillInterleave("sequential", "streamed", 0)).toBe(false);
  });

  it("falls back to the configured concurrency cap", () => {
    expect(outputWillInterleave("parallel", "streamed")).toBe(true);

    configure({ scheduler: { maxConcurrency: 1 } });

    expect(outputWillInterleave("parallel", "streamed")).toBe(false);
    expect(outputWillInterleave("parallel", "streamed", undefined)).toBe(false);
  });
});
