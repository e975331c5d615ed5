import { z } from "zod";
import { ConfigError } from "./errors.js";

const TaskName = z
  .string()
  .min(1, "task name must not be empty")
  .regex(/^[^\s]+$/, "task name must not contain whitespace");

export const TaskDefinitionSchema = z.object({
  name: TaskName,
  dependsOn: z.array(TaskName).default([]),
  before: z.array(TaskName).optional(),
  command: z.string().optional(),
  description: z.string().optional(),
  inputs: z.array(z.string().min(1)).optional(),
  cwd: z.string().optional(),
  env: z.record(z.string()).optional(),
});

export const TasksConfigSchema = z.object({
  tasks: z.array(TaskDefinitionSchema),
  roots: z.array(z.string().min(1)).default([]),
});

/** On-disk format: tasks keyed by name. */
export const TasksFileSchema = z.object({
  tasks: z.record(TaskName, TaskDefinitionSchema.omit({ name: true })),
  roots: z.array(z.string().min(1)).optional(),
});

export const VerbositySchema = z.enum(["quiet", "normal", "verbose"]);

export type TasksConfigInput = z.input<typeof TasksConfigSchema>;
export type TasksConfig = z.output<typeof TasksConfigSchema>;
export type TasksFile = z.output<typeof TasksFileSchema>;
export type Verbosity = z.infer<typeof VerbositySchema>;

/** Parse with a zod schema, turning issues into a single `ConfigError`. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError("INVALID_CONFIG", `Invalid ${what}: ${issues}`, { cause: result.error });
  }
  return result.data;
}
