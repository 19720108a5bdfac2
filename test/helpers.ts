import { Writable } from "node:stream";
import { setTimeout as sleep } from "node:timers/promises";
import type { TaskDescriptor } from "../src/catalog/types.js";
import { createOutcome } from "../src/executor/process-runner.js";
import type { TaskRunner } from "../src/executor/types.js";

export const makeTask = (name: string): TaskDescriptor => ({
  entry: `${name}.py`,
  name,
  path: `/tasks/${name}.py`,
});

export type FakePlan = Record<string, { delayMs: number; fail?: boolean; output?: string }>;

/** In-process stand-in for the child-process runner. */
export function fakeRunner(plan: FakePlan, events?: string[]): TaskRunner {
  return async (task) => {
    const step = plan[task.name] ?? { delayMs: 0 };
    events?.push(`start:${task.name}`);
    await sleep(step.delayMs);
    events?.push(`end:${task.name}`);
    return createOutcome(
      task.name,
      step.delayMs,
      step.output ?? "",
      step.fail ? { kind: "exit", message: "exited with code 1", exitCode: 1 } : undefined,
    );
  };
}

export function collector(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}
