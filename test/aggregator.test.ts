import { describe, expect, it } from "vitest";
import { createOutcome } from "../src/executor/process-runner.js";
import type { TaskOutcome } from "../src/executor/types.js";
import { exitCodeFor, renderSummary, summarize } from "../src/report/aggregator.js";

const ok = (name: string, durationMs = 1_000): TaskOutcome => createOutcome(name, durationMs, "");
const failed = (name: string, durationMs = 2_000, output = ""): TaskOutcome =>
  createOutcome(name, durationMs, output, { kind: "exit", message: "exited with code 1", exitCode: 1 });

describe("summarize", () => {
  it("partitions outcomes and keeps failure order", () => {
    const outcomes = [failed("c"), ok("a"), failed("b")];

    const summary = summarize(outcomes, 3_000);

    expect(summary.total).toBe(3);
    expect(summary.succeeded).toBe(1);
    expect(summary.failed).toBe(2);
    expect(summary.durationMs).toBe(3_000);
    expect(summary.failures.map((o) => o.name)).toEqual(["c", "b"]);
  });

  it("holds success exactly when there is no error", () => {
    for (const outcome of [ok("a"), failed("b")]) {
      expect(outcome.success).toBe(outcome.error === undefined);
    }
  });
});

describe("exitCodeFor", () => {
  it("is 0 when everything succeeded", () => {
    expect(exitCodeFor(summarize([ok("a"), ok("b"), ok("c")], 0))).toBe(0);
  });

  it("is 0 for an empty run", () => {
    expect(exitCodeFor(summarize([], 0))).toBe(0);
  });

  it("is 1 for any number of failures", () => {
    expect(exitCodeFor(summarize([ok("a"), failed("b")], 0))).toBe(1);
    expect(exitCodeFor(summarize([failed("a"), failed("b")], 0))).toBe(1);
  });
});

describe("renderSummary", () => {
  const heavy = "=".repeat(60);
  const light = "-".repeat(60);

  it("renders per-task lines and failure details", () => {
    const outcomes = [ok("a"), failed("b", 2_000, "Traceback: boom\n")];

    const lines = renderSummary(summarize(outcomes, 2_000), outcomes);

    expect(lines).toEqual([
      "",
      heavy,
      "Execution Summary (Total time: 2.00s)",
      heavy,
      `✓ ${"a".padEnd(15)} - 1.00s`,
      `✗ ${"b".padEnd(15)} - 2.00s (ERROR)`,
      light,
      "Results: 1 successful, 1 failed",
      "",
      "Failed Tasks Details:",
      light,
      "",
      "b:",
      "Error: exited with code 1",
      "Output:",
      "Traceback: boom",
    ]);
  });

  it("omits the output block when nothing was captured", () => {
    const outcomes = [failed("b")];

    const lines = renderSummary(summarize(outcomes, 2_000), outcomes);

    expect(lines.slice(-2)).toEqual(["b:", "Error: exited with code 1"]);
  });

  it("has no failure section when every task succeeded", () => {
    const outcomes = [ok("a"), ok("b"), ok("c")];

    const lines = renderSummary(summarize(outcomes, 1_000), outcomes);

    expect(lines).toContain("Results: 3 successful, 0 failed");
    expect(lines).not.toContain("Failed Tasks Details:");
  });

  it("renders an empty run", () => {
    const lines = renderSummary(summarize([], 0), []);

    expect(lines).toEqual(["", heavy, "Execution Summary (Total time: 0ms)", heavy, light, "Results: 0 successful, 0 failed"]);
  });

  it("honours a custom layout", () => {
    const outcomes = [ok("a")];

    const lines = renderSummary(summarize(outcomes, 1_000), outcomes, { nameWidth: 3, ruleWidth: 10 });

    expect(lines[1]).toBe("=".repeat(10));
    expect(lines[4]).toBe("✓ a   - 1.00s");
  });
});
