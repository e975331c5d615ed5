import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../src/errors.js";
import { loadTasksFile, toTasksConfig } from "../src/loader.js";
import { parseOrThrow, TasksConfigSchema } from "../src/schemas.js";

describe("parseOrThrow", () => {
  it("fills in defaults", () => {
    const config = parseOrThrow(TasksConfigSchema, { tasks: [{ name: "a" }] }, "task configuration");
    expect(config).toEqual({ tasks: [{ name: "a", dependsOn: [] }], roots: [] });
  });

  it("joins every issue into one ConfigError", () => {
    const run = () => parseOrThrow(TasksConfigSchema, { tasks: [{ name: "has space" }] }, "task configuration");

    expect(run).toThrow(ConfigError);
    expect(run).toThrow("Invalid task configuration: tasks.0.name: task name must not contain whitespace");
  });
});

describe("toTasksConfig", () => {
  const base = resolve("/work");

  it("names tasks from their keys and resolves cwd against the base directory", () => {
    const config = toTasksConfig(
      { tasks: { b: { dependsOn: ["a"], cwd: "sub" }, a: { dependsOn: [] } }, roots: ["b"] },
      base,
    );

    expect(config).toEqual({
      tasks: [
        { name: "b", dependsOn: ["a"], cwd: join(base, "sub") },
        { name: "a", dependsOn: [], cwd: base },
      ],
      roots: ["b"],
    });
  });

  it("prefers explicit roots over the file's", () => {
    const file = { tasks: { a: { dependsOn: [] } }, roots: ["a"] };
    expect(toTasksConfig(file, base, ["ci"]).roots).toEqual(["ci"]);
    expect(toTasksConfig(file, base, []).roots).toEqual(["a"]);
    expect(toTasksConfig({ tasks: {} }, base).roots).toEqual([]);
  });
});

describe("loadTasksFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tasklane-loader-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads a tasks file", async () => {
    const path = join(dir, "tasks.json");
    await writeFile(path, JSON.stringify({ tasks: { build: { command: "make" } } }));

    const config = await loadTasksFile(path);

    expect(config).toEqual({
      tasks: [{ name: "build", dependsOn: [], command: "make", cwd: dir }],
      roots: [],
    });
  });

  it("fails with CONFIG_NOT_FOUND when the file is missing", async () => {
    await expect(loadTasksFile(join(dir, "missing.json"))).rejects.toMatchObject({ code: "CONFIG_NOT_FOUND" });
  });

  it("fails with INVALID_CONFIG on malformed JSON", async () => {
    const path = join(dir, "tasks.json");
    await writeFile(path, "{ tasks:");

    await expect(loadTasksFile(path)).rejects.toMatchObject({ code: "INVALID_CONFIG" });
    await expect(loadTasksFile(path)).rejects.toThrow(`Tasks file ${path} is not valid JSON`);
  });

  it("fails with INVALID_CONFIG when the shape is wrong", async () => {
    const path = join(dir, "tasks.json");
    await writeFile(path, JSON.stringify({ tasks: { build: { dependsOn: "setup" } } }));

    await expect(loadTasksFile(path)).rejects.toThrow(
      `Invalid tasks file ${path}: tasks.build.dependsOn: Expected array, received string`,
    );
  });
});
