import { z } from "zod";
import { ValidationError } from "./errors.js";

export const OutputModeSchema = z.enum(["streamed", "buffered"]);

export const SchedulePolicySchema = z.enum(["sequential", "parallel"]);

const millis = z.number().int().nonnegative();

export const ConfigFileSchema = z
  .object({
    runner: z
      .object({
        interpreter: z.string(),
        outputMode: OutputModeSchema,
        taskTimeoutMs: millis,
        killGraceMs: millis,
      })
      .partial()
      .strict(),
    scheduler: z
      .object({
        policy: SchedulePolicySchema,
        maxConcurrency: z.number().int().nonnegative(),
        progressIntervalMs: millis,
      })
      .partial()
      .strict(),
    report: z
      .object({
        nameWidth: z.number().int().nonnegative(),
        ruleWidth: z.number().int().positive(),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

const entryName = z.string().trim().min(1, "catalog entries must not be empty");

/** A catalog file holds either a bare array of entries or `{ "tasks": [...] }`. */
export const CatalogFileSchema = z
  .union([z.array(entryName), z.object({ tasks: z.array(entryName) })])
  .transform((value) => (Array.isArray(value) ? value : value.tasks));

const numericFlag = z.coerce.number().int().nonnegative();

/** Raw commander options of the `run` command. */
export const RunCommandOptionsSchema = z.object({
  catalog: z.string().optional(),
  config: z.string().optional(),
  policy: SchedulePolicySchema.optional(),
  mode: OutputModeSchema.optional(),
  interpreter: z.string().optional(),
  concurrency: numericFlag.optional(),
  timeout: numericFlag.optional(),
  progressInterval: numericFlag.optional(),
});

export type RunCommandOptions = z.infer<typeof RunCommandOptionsSchema>;

/** Raw commander options of the `list` command. */
export const ListCommandOptionsSchema = z.object({
  catalog: z.string().optional(),
});

export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, context: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ValidationError("INVALID_INPUT", `Invalid ${context}: ${issues}`, { cause: result.error });
  }
  return result.data;
}
