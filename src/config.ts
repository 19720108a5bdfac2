import { readFileSync } from "node:fs";
import { ConfigError } from "./errors.js";
import type { OutputMode } from "./executor/types.js";
import type { SchedulePolicy } from "./scheduler/types.js";
import { ConfigFileSchema, parseOrThrow } from "./schemas.js";

export type HarnessConfig = {
  runner: {
    /** Command each task path is handed to. Empty string runs the path directly. */
    interpreter: string;
    outputMode: OutputMode;
    /** 0 disables the per-task timeout. */
    taskTimeoutMs: number;
    /** Wait between SIGTERM and SIGKILL for a timed-out task. */
    killGraceMs: number;
  };
  scheduler: {
    policy: SchedulePolicy;
    /** 0 means one concurrent unit per task. */
    maxConcurrency: number;
    /** 0 disables periodic progress updates. */
    progressIntervalMs: number;
  };
  report: {
    nameWidth: number;
    ruleWidth: number;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: HarnessConfig = {
  runner: {
    interpreter: "python3",
    outputMode: "buffered",
    taskTimeoutMs: 0,
    killGraceMs: 2_000,
  },
  scheduler: {
    policy: "parallel",
    maxConcurrency: 0,
    progressIntervalMs: 10_000,
  },
  report: {
    nameWidth: 15,
    ruleWidth: 60,
  },
};

let current: HarnessConfig = structuredClone(DEFAULTS);

/** Override config values. Merges section by section over the defaults. */
export function configure(overrides: DeepPartial<HarnessConfig>): void {
  current = {
    runner: { ...DEFAULTS.runner, ...overrides.runner },
    scheduler: { ...DEFAULTS.scheduler, ...overrides.scheduler },
    report: { ...DEFAULTS.report, ...overrides.report },
  };
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<HarnessConfig> {
  return current;
}

/** Read a JSON config file, validate it and apply it over the defaults. */
export function loadConfigFile(path: string): void {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError("CONFIG_UNREADABLE", `Cannot read config file "${path}": ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  configure(parseOrThrow(ConfigFileSchema, raw, `config file "${path}"`));
}

/** The default config values (frozen). */
export const defaults: Readonly<HarnessConfig> = Object.freeze(structuredClone(DEFAULTS));
