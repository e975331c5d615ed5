import { beforeEach, describe, expect, it } from "vitest";
import { configure, defaults, getConfig, resetConfig } from "../src/config.js";
import { ConfigError, GraphError } from "../src/errors.js";
import { CacheStore } from "../src/persistence/store.js";
import { FunctionRunner } from "../src/runners/function-runner.js";
import { Tasks } from "../src/tasks.js";
import { MemoryCache } from "../src/utils/cache.js";

const runners = [new FunctionRunner({ a: async () => 1, b: async () => 2 })];

describe("Tasks.create", () => {
  beforeEach(() => {
    resetConfig();
  });

  it("validates the configuration", () => {
    const create = () => Tasks.create({ tasks: [{ name: "" }] }, "quiet", { cache: null, runners });

    expect(create).toThrow(ConfigError);
    expect(create).toThrow("Invalid task configuration: tasks.0.name: task name must not be empty");
  });

  it("surfaces graph errors", () => {
    expect(() =>
      Tasks.create({ tasks: [{ name: "a", dependsOn: ["b"] }, { name: "b", dependsOn: ["a"] }] }, "quiet", {
        cache: null,
        runners,
      }),
    ).toThrow(GraphError);
  });

  it("exposes order, roots and name width", () => {
    const tasks = Tasks.create(
      { tasks: [{ name: "b", dependsOn: ["a"] }, { name: "a" }, { name: "unused" }], roots: ["b"] },
      "normal",
      { cache: null, runners },
    );

    expect(tasks.tasksOrder).toEqual(["a", "b"]);
    expect(tasks.rootNames).toEqual(["b"]);
    expect(tasks.longestTaskName).toBe(1);
    expect(tasks.verbosity).toBe("normal");
    expect(tasks.cell("unused")).toBeUndefined();
  });

  it("starts with every task pending", async () => {
    const tasks = Tasks.create({ tasks: [{ name: "a" }, { name: "b", dependsOn: ["a"] }] }, "quiet", {
      cache: null,
      runners,
    });

    const snapshot = await tasks.snapshot();

    expect(snapshot.map((s) => [s.task.name, s.status.state])).toEqual([
      ["a", "pending"],
      ["b", "pending"],
    ]);
  });

  it("runs an empty configuration", async () => {
    const tasks = Tasks.create({ tasks: [] }, "quiet", { cache: null, runners });
    const { summary, outputs } = await tasks.run();

    expect(summary.total).toBe(0);
    expect(outputs).toEqual({});
  });

  it("uses no cache when caching is disabled", () => {
    configure({ cache: { enabled: false } });
    const tasks = Tasks.create({ tasks: [{ name: "a" }] }, "quiet", { runners });
    expect(tasks.cache).toBeUndefined();
  });

  it("opens its own store when no cache is given", () => {
    const tasks = Tasks.create({ tasks: [{ name: "a" }] }, "quiet", { runners, dbPath: ":memory:" });
    try {
      expect(tasks.cache).toBeInstanceOf(CacheStore);
    } finally {
      tasks.close();
    }
  });

  it("uses the cache it is given", () => {
    const cache = new MemoryCache();
    const tasks = Tasks.create({ tasks: [{ name: "a" }] }, "quiet", { runners, cache });
    expect(tasks.cache).toBe(cache);
  });
});

describe("config", () => {
  beforeEach(() => {
    resetConfig();
  });

  it("merges overrides into each section", () => {
    configure({ output: { maxCapturedLines: 5 }, ui: { nameWidth: 20 } });

    expect(getConfig().output.maxCapturedLines).toBe(5);
    expect(getConfig().ui).toEqual({ ...defaults.ui, nameWidth: 20 });
    expect(getConfig().cache).toEqual(defaults.cache);
  });

  it("resets to defaults", () => {
    configure({ cache: { enabled: false } });
    resetConfig();
    expect(getConfig()).toEqual(defaults);
  });
});
