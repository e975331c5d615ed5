import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { ConfigError, errorMessage } from "./errors.js";
import { parseOrThrow, TasksFileSchema, type TasksConfig, type TasksFile } from "./schemas.js";

/**
 * Load a tasks file. Task `cwd` values resolve against the file's directory,
 * which is also the default working directory.
 */
export async function loadTasksFile(path: string, roots?: string[]): Promise<TasksConfig> {
  const absolute = resolve(path);
  let raw: string;
  try {
    raw = await readFile(absolute, "utf8");
  } catch (err) {
    throw new ConfigError("CONFIG_NOT_FOUND", `Cannot read tasks file ${absolute}: ${errorMessage(err)}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError("INVALID_CONFIG", `Tasks file ${absolute} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const file = parseOrThrow(TasksFileSchema, json, `tasks file ${absolute}`);
  return toTasksConfig(file, dirname(absolute), roots);
}

export function toTasksConfig(file: TasksFile, baseDir: string, roots?: string[]): TasksConfig {
  return {
    tasks: Object.entries(file.tasks).map(([name, def]) => ({
      ...def,
      name,
      cwd: resolve(baseDir, def.cwd ?? "."),
    })),
    roots: roots && roots.length > 0 ? roots : file.roots ?? [],
  };
}
