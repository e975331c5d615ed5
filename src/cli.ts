#!/usr/bin/env node

import { Command } from "commander";
import { configure, getConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { loadTasksFile } from "./loader.js";
import { CacheStore } from "./persistence/store.js";
import type { Verbosity } from "./schemas.js";
import { Tasks } from "./tasks.js";
import { hasFailures, TasksUi } from "./ui/tasks-ui.js";
import { log, setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  log.error("Unhandled rejection", { reason: errorMessage(reason) });
  process.exitCode = 1;
});

const program = new Command();

program
  .name("tasklane")
  .description("Run interdependent tasks as a DAG, concurrently and with caching")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
});

type RunCommandOptions = {
  file: string;
  quiet?: boolean;
  verbose?: boolean;
  db?: string;
  cache: boolean;
};

// --- run ---
program
  .command("run")
  .description("Run the given tasks (or namespaces) and their dependencies")
  .argument("[roots...]", "Task names or namespaces to run (default: file roots, else all)")
  .option("-f, --file <path>", "Tasks file", "tasks.json")
  .option("-q, --quiet", "Only print failures")
  .option("-v, --verbose", "Print every line of task output")
  .option("--db <path>", "Cache store location")
  .option("--no-cache", "Run every task, ignoring cached results")
  .action(async (roots: string[], opts: RunCommandOptions) => {
    const verbosity: Verbosity = opts.quiet ? "quiet" : opts.verbose ? "verbose" : "normal";
    if (!opts.cache) configure({ cache: { enabled: false } });

    let store: CacheStore | undefined;
    try {
      const config = await loadTasksFile(opts.file, roots);
      store = getConfig().cache.enabled ? new CacheStore(opts.db) : undefined;
      const ui = TasksUi.create(config, verbosity, { cache: store ?? null });

      const [status] = await ui.run();
      if (store) store.recordAll(ui.tasks.successfulFingerprints());
      if (hasFailures(status)) process.exitCode = 1;
    } catch (err) {
      console.error("Error:", errorMessage(err));
      process.exitCode = 1;
    } finally {
      store?.close();
    }
  });

// --- list ---
program
  .command("list")
  .description("Print the selected tasks in execution order")
  .argument("[roots...]", "Task names or namespaces (default: all)")
  .option("-f, --file <path>", "Tasks file", "tasks.json")
  .action(async (roots: string[], opts: { file: string }) => {
    try {
      const config = await loadTasksFile(opts.file, roots);
      const tasks = Tasks.create(config, "quiet", { cache: null });
      const width = tasks.longestTaskName;
      for (const name of tasks.tasksOrder) {
        const task = tasks.graph.get(name);
        const deps = task.dependsOn.length > 0 ? ` <- ${task.dependsOn.join(", ")}` : "";
        const description = task.description ? `  ${task.description}` : "";
        console.log(`${name.padEnd(width)}${deps}${description}`);
      }
    } catch (err) {
      console.error("Error:", errorMessage(err));
      process.exitCode = 1;
    }
  });

// --- cache ---
const cache = program.command("cache").description("Inspect or clear the cache store");

cache.command("list")
  .description("List recorded fingerprints")
  .option("--db <path>", "Cache store location")
  .option("-t, --task <name>", "Only entries for this task")
  .action((opts: { db?: string; task?: string }) => {
    const store = new CacheStore(opts.db);
    try {
      for (const entry of store.list(opts.task)) {
        console.log(`${entry.fingerprint}  ${entry.taskName}`);
      }
    } finally {
      store.close();
    }
  });

cache.command("clear")
  .description("Forget every recorded result")
  .option("--db <path>", "Cache store location")
  .action((opts: { db?: string }) => {
    const store = new CacheStore(opts.db);
    try {
      console.log(`Removed ${store.clear()} cached result(s)`);
    } finally {
      store.close();
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
