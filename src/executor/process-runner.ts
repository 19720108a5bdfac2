import { spawn, type ChildProcess } from "node:child_process";
import { dirname } from "node:path";
import type { TaskDescriptor } from "../catalog/types.js";
import { getConfig } from "../config.js";
import { log } from "../utils/logger.js";
import type { OutputMode, TaskFailure, TaskOutcome } from "./types.js";

export type ProcessRunnerOptions = {
  /** Command the task path is passed to (default: config `runner.interpreter`). Empty runs the path itself. */
  interpreter?: string;
  mode?: OutputMode;
  /** Kill the task after this many ms. 0 disables it (default: config `runner.taskTimeoutMs`). */
  timeoutMs?: number;
  /** Grace period between `SIGTERM` and `SIGKILL` once a task has timed out (default: config `runner.killGraceMs`). */
  killGraceMs?: number;
  /** Where streamed stdout is relayed (default: process.stdout). */
  stdout?: NodeJS.WritableStream;
  /** Where streamed stderr is relayed (default: process.stderr). */
  stderr?: NodeJS.WritableStream;
};

export function createOutcome(name: string, durationMs: number, output: string, error?: TaskFailure): TaskOutcome {
  return Object.freeze(error ? { name, success: false, durationMs, error, output } : { name, success: true, durationMs, output });
}

function errnoCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

export class ProcessRunner {
  readonly interpreter: string;
  readonly mode: OutputMode;
  readonly timeoutMs: number;
  readonly killGraceMs: number;

  private stdout: NodeJS.WritableStream;
  private stderr: NodeJS.WritableStream;

  constructor(opts?: ProcessRunnerOptions) {
    const config = getConfig().runner;
    this.interpreter = opts?.interpreter ?? config.interpreter;
    this.mode = opts?.mode ?? config.outputMode;
    this.timeoutMs = opts?.timeoutMs ?? config.taskTimeoutMs;
    this.killGraceMs = opts?.killGraceMs ?? config.killGraceMs;
    this.stdout = opts?.stdout ?? process.stdout;
    this.stderr = opts?.stderr ?? process.stderr;
  }

  /** A `TaskRunner` bound to this instance. */
  readonly run = (task: TaskDescriptor): Promise<TaskOutcome> => {
    const start = Date.now();
    const command = this.interpreter === "" ? task.path : this.interpreter;
    const args = this.interpreter === "" ? [] : [task.path];
    const cwd = dirname(task.path);

    log.debug(`Launching "${task.name}"`, { command, args, cwd, mode: this.mode });

    return new Promise<TaskOutcome>((resolve) => {
      const chunks: Buffer[] = [];
      let settled = false;
      let timedOut = false;
      let timer: ReturnType<typeof setTimeout> | undefined;
      let killTimer: ReturnType<typeof setTimeout> | undefined;

      const finish = (error?: TaskFailure): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);
        const output = this.mode === "buffered" ? Buffer.concat(chunks).toString("utf-8") : "";
        resolve(createOutcome(task.name, Date.now() - start, output, error));
      };

      let child: ChildProcess;
      try {
        child = spawn(command, args, { cwd, stdio: ["ignore", "pipe", "pipe"] });
      } catch (err) {
        const cause = err instanceof Error ? err : new Error(String(err));
        finish({ kind: "launch", message: cause.message, code: errnoCode(cause) });
        return;
      }

      child.stdout?.on("data", (chunk: Buffer) => {
        if (this.mode === "buffered") chunks.push(chunk);
        else this.stdout.write(chunk);
      });
      child.stderr?.on("data", (chunk: Buffer) => {
        if (this.mode === "buffered") chunks.push(chunk);
        else this.stderr.write(chunk);
      });

      child.on("error", (err) => {
        finish({ kind: "launch", message: err.message, code: errnoCode(err) });
      });

      child.on("close", (code, signal) => {
        if (timedOut) {
          finish({ kind: "timeout", message: `timed out after ${this.timeoutMs}ms`, timeoutMs: this.timeoutMs });
        } else if (code === 0) {
          finish();
        } else if (signal) {
          finish({ kind: "signal", message: `terminated by signal ${signal}`, signal });
        } else {
          const exitCode = code ?? 1;
          finish({ kind: "exit", message: `exited with code ${exitCode}`, exitCode });
        }
      });

      if (this.timeoutMs > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          log.warn(`Task "${task.name}" exceeded ${this.timeoutMs}ms, terminating`);
          child.kill("SIGTERM");
          killTimer = setTimeout(() => {
            log.warn(`Task "${task.name}" ignored SIGTERM for ${this.killGraceMs}ms, killing`);
            child.kill("SIGKILL");
          }, this.killGraceMs);
        }, this.timeoutMs);
      }
    });
  };
}
