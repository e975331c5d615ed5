import { getConfig } from "./config.js";
import { Executor } from "./executor/executor.js";
import type { ExecutionResult } from "./executor/types.js";
import { createTaskGraph, type TaskGraph } from "./graph/task-graph.js";
import { TaskStateCell } from "./graph/task-state.js";
import type { CapturedLine, OutputStream, TaskState } from "./graph/types.js";
import { fingerprintTask } from "./persistence/fingerprint.js";
import { CacheStore } from "./persistence/store.js";
import type { CachedTask, CacheOracle, Fingerprinter } from "./persistence/types.js";
import { ShellRunner } from "./runners/shell-runner.js";
import type { TaskRunner } from "./runners/runner.js";
import { parseOrThrow, TasksConfigSchema, VerbositySchema, type TasksConfigInput, type Verbosity } from "./schemas.js";
import { log } from "./utils/logger.js";
import { Notifier } from "./utils/notifier.js";

const logger = log.child("tasks");

export type TasksOptions = {
  /** Location of the cache store; defaults to the configured path. */
  dbPath?: string;
  /** Cache oracle to use instead of opening a store. `null` disables caching. */
  cache?: CacheOracle | null;
  /** Tried in order; the first that accepts a task runs it. Defaults to a shell runner. */
  runners?: TaskRunner[];
  fingerprint?: Fingerprinter;
  onOutputLine?: (taskName: string, stream: OutputStream, line: CapturedLine) => void;
};

/**
 * A constructed engine for one run. The graph is fixed at construction;
 * observers may read `cells` and wait on `notifier` while `run()` is in
 * flight.
 */
export class Tasks {
  readonly graph: TaskGraph;
  readonly cells: ReadonlyMap<string, TaskStateCell>;
  readonly notifier = new Notifier();
  readonly verbosity: Verbosity;
  readonly cache?: CacheOracle;
  private executor: Executor;
  private ownedStore?: CacheStore;

  private constructor(graph: TaskGraph, verbosity: Verbosity, opts: TasksOptions) {
    this.graph = graph;
    this.verbosity = verbosity;

    const cells = new Map<string, TaskStateCell>();
    for (const name of graph.tasksOrder) cells.set(name, new TaskStateCell(graph.get(name)));
    this.cells = cells;

    if (opts.cache !== undefined) {
      this.cache = opts.cache ?? undefined;
    } else if (getConfig().cache.enabled) {
      this.ownedStore = new CacheStore(opts.dbPath);
      this.cache = this.ownedStore;
    }

    this.executor = new Executor(graph, cells, {
      runners: opts.runners ?? [new ShellRunner()],
      notifier: this.notifier,
      fingerprint: opts.fingerprint ?? fingerprintTask,
      cache: this.cache,
      maxCapturedLines: getConfig().output.maxCapturedLines,
      onOutputLine: opts.onOutputLine,
    });
  }

  /**
   * Validate the configuration and build the graph. Throws `ConfigError`,
   * `GraphError` (cycles, unknown dependencies, unknown roots) or
   * `CacheError` when the store cannot be opened.
   */
  static create(config: TasksConfigInput, verbosity: Verbosity = "normal", opts: TasksOptions = {}): Tasks {
    const parsed = parseOrThrow(TasksConfigSchema, config, "task configuration");
    const level = parseOrThrow(VerbositySchema, verbosity, "verbosity");
    const graph = createTaskGraph(parsed.tasks, parsed.roots);
    logger.debug("Task graph built", { tasks: graph.size, roots: graph.rootNames });
    return new Tasks(graph, level, opts);
  }

  get tasksOrder(): readonly string[] {
    return this.graph.tasksOrder;
  }

  get rootNames(): readonly string[] {
    return this.graph.rootNames;
  }

  get longestTaskName(): number {
    return this.graph.longestTaskName;
  }

  cell(name: string): TaskStateCell | undefined {
    return this.cells.get(name);
  }

  /** Read every cell, in topological order. */
  async snapshot(): Promise<TaskState[]> {
    const states: TaskState[] = [];
    for (const name of this.graph.tasksOrder) {
      const cell = this.cells.get(name);
      if (cell) states.push(await cell.read());
    }
    return states;
  }

  run(): Promise<ExecutionResult> {
    return this.executor.execute();
  }

  /** Fingerprints of tasks that ran successfully, for recording after the run. */
  successfulFingerprints(): CachedTask[] {
    return this.executor.successfulFingerprints();
  }

  /** Close the cache store if this engine opened it. */
  close(): void {
    this.ownedStore?.close();
    this.ownedStore = undefined;
  }
}
