#!/usr/bin/env node

import { Command } from "commander";
import { DEFAULT_CATALOG_PATH, loadCatalog } from "./catalog/default.js";
import { getConfig, loadConfigFile } from "./config.js";
import { HarnessError } from "./errors.js";
import { Harness } from "./harness.js";
import { renderSummary } from "./report/aggregator.js";
import { createConsoleCallbacks, outputWillInterleave } from "./report/console.js";
import { ListCommandOptionsSchema, RunCommandOptionsSchema, parseOrThrow } from "./schemas.js";
import { isLogLevel, log, setLogLevel } from "./utils/logger.js";

const program = new Command();

program
  .name("batch-harness")
  .description("Run a catalog of independent scripts and report the aggregated result")
  .version("0.1.0")
  .option("--debug", "Enable debug logging")
  .option("--log-level <level>", "Log level (debug, info, warn, error)");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (typeof opts.logLevel === "string") {
    if (!isLogLevel(opts.logLevel)) {
      throw new HarnessError("INVALID_INPUT", `Unknown log level "${opts.logLevel}"`);
    }
    setLogLevel(opts.logLevel);
  }
  if (opts.debug) setLogLevel("debug");
});

// --- run ---
program
  .command("run", { isDefault: true })
  .description("Run every task of the catalog that exists under the base directory")
  .argument("[baseDir]", "Directory the catalog entries live in", ".")
  .option("-c, --catalog <file>", `Catalog JSON file (default: ${DEFAULT_CATALOG_PATH})`)
  .option("--config <file>", "Harness config JSON file")
  .option("-p, --policy <policy>", "Scheduling policy: sequential or parallel")
  .option("-m, --mode <mode>", "Task output: streamed (live) or buffered (captured)")
  .option("-i, --interpreter <command>", "Interpreter each task is run with; empty runs the file itself")
  .option("--concurrency <n>", "Max tasks in flight for parallel runs (0 = all)")
  .option("--timeout <ms>", "Per-task timeout in ms (0 = none)")
  .option("--progress-interval <ms>", "Interval of progress updates for parallel runs (0 = off)")
  .action(async (baseDir: string, rawOpts: unknown) => {
    const opts = parseOrThrow(RunCommandOptionsSchema, rawOpts, "run options");
    if (opts.config) loadConfigFile(opts.config);

    const entries = await loadCatalog(opts.catalog);
    const config = getConfig();
    const policy = opts.policy ?? config.scheduler.policy;
    const mode = opts.mode ?? config.runner.outputMode;

    if (outputWillInterleave(policy, mode, opts.concurrency)) {
      log.warn("Streamed output from concurrent tasks will interleave; use --mode buffered for readable output");
    }

    const report = await new Harness().run(
      entries,
      {
        baseDir,
        policy,
        mode,
        interpreter: opts.interpreter,
        maxConcurrency: opts.concurrency,
        taskTimeoutMs: opts.timeout,
        progressIntervalMs: opts.progressInterval,
      },
      createConsoleCallbacks(policy),
    );

    for (const line of renderSummary(report.summary, report.outcomes)) {
      console.log(line);
    }
    process.exitCode = report.exitCode;
  });

// --- list ---
program
  .command("list")
  .description("Show which catalog entries resolve under the base directory")
  .argument("[baseDir]", "Directory the catalog entries live in", ".")
  .option("-c, --catalog <file>", "Catalog JSON file")
  .action(async (baseDir: string, rawOpts: unknown) => {
    const opts = parseOrThrow(ListCommandOptionsSchema, rawOpts, "list options");
    const entries = await loadCatalog(opts.catalog);
    const { tasks, missing } = await new Harness().resolve(entries, baseDir);
    for (const task of tasks) {
      console.log(`${task.name.padEnd(getConfig().report.nameWidth)} ${task.path}`);
    }
    console.log(`\n${tasks.length} task(s) resolved, ${missing.length} missing${missing.length ? `: ${missing.join(", ")}` : ""}`);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
