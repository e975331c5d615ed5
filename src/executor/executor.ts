import { performance } from "node:perf_hooks";
import { CacheError, errorMessage, InvariantError } from "../errors.js";
import type { TaskGraph } from "../graph/task-graph.js";
import type { TaskStateCell } from "../graph/task-state.js";
import {
  unblocksDependents,
  type CapturedLine,
  type JsonValue,
  type OutputStream,
  type TaskCompleted,
  type TaskDefinition,
  type TaskFailure,
} from "../graph/types.js";
import type { CachedTask } from "../persistence/types.js";
import { log } from "../utils/logger.js";
import type { ExecutionOptions, ExecutionResult, RunSummary } from "./types.js";

const logger = log.child("executor");

/**
 * Drives every node of a graph to a terminal status. Each node is one
 * promise that first awaits its dependencies' promises, so ready tasks run
 * as soon as their last dependency settles, with no cap and no queue.
 */
export class Executor {
  private graph: TaskGraph;
  private cells: ReadonlyMap<string, TaskStateCell>;
  private opts: ExecutionOptions;
  private fingerprints = new Map<string, string>();
  private outputs = new Map<string, JsonValue>();
  private infraError?: CacheError;
  private started = false;

  constructor(graph: TaskGraph, cells: ReadonlyMap<string, TaskStateCell>, opts: ExecutionOptions) {
    this.graph = graph;
    this.cells = cells;
    this.opts = opts;
  }

  /**
   * Resolves once every node is terminal. Task failures are reported as
   * data; only a failing cache oracle rejects, after the run has finished.
   */
  async execute(): Promise<ExecutionResult> {
    if (this.started) throw new InvariantError("ALREADY_STARTED", "Tasks can only be run once");
    this.started = true;

    const start = performance.now();
    const settled = new Map<string, Promise<TaskCompleted>>();
    for (const name of this.graph.tasksOrder) {
      const deps = this.graph.dependenciesOf(name).map((dep) => {
        const promise = settled.get(dep);
        if (!promise) {
          throw new InvariantError("INVALID_TRANSITION", `Dependency "${dep}" of "${name}" is scheduled after it`);
        }
        return promise;
      });
      settled.set(name, this.executeNode(name, deps));
    }

    const outcomes = await Promise.all(settled.values());
    const summary = summarize(outcomes, performance.now() - start);
    logger.debug("Run finished", summary);

    if (this.infraError) throw this.infraError;
    return { summary, outputs: Object.fromEntries(this.outputs) };
  }

  /** Fingerprints of tasks that succeeded, for the caller to record. */
  successfulFingerprints(): CachedTask[] {
    return [...this.fingerprints]
      .filter(([name]) => this.outputs.has(name))
      .map(([taskName, fingerprint]) => ({ taskName, fingerprint }));
  }

  private async executeNode(name: string, deps: Promise<TaskCompleted>[]): Promise<TaskCompleted> {
    const depOutcomes = await Promise.all(deps);
    const cell = this.cell(name);
    const task = cell.task;

    if (!depOutcomes.every(unblocksDependents)) {
      return this.finish(cell, { kind: "dependencyFailed" });
    }

    let fingerprint: string | undefined;
    try {
      fingerprint = await this.opts.fingerprint(task);
    } catch (err) {
      return this.failWithoutRunning(cell, `Cannot compute fingerprint: ${errorMessage(err)}`);
    }

    if (fingerprint !== undefined) {
      this.fingerprints.set(name, fingerprint);
      if (this.opts.cache) {
        let hit: boolean;
        try {
          hit = await this.opts.cache.lookup(fingerprint);
        } catch (err) {
          this.infraError ??= new CacheError(`Cache lookup failed: ${errorMessage(err)}`, { cause: err });
          return this.failWithoutRunning(cell, `Cache lookup failed: ${errorMessage(err)}`);
        }
        if (hit) {
          return this.finish(cell, { kind: "skipped", skipped: { kind: "cached", fingerprint } });
        }
      }
    }

    const runner = this.opts.runners.find((r) => r.canRun(task));
    if (!runner) {
      return this.finish(cell, { kind: "skipped", skipped: { kind: "notImplemented" } });
    }

    const startedAt = await cell.beginRun();
    this.opts.notifier.notify();
    logger.debug(`Task "${name}" running`, { runner: runner.name });

    const stdout: CapturedLine[] = [];
    const stderr: CapturedLine[] = [];
    let settled = false;
    const onLine = (stream: OutputStream, text: string): void => {
      if (settled) return;
      const line: CapturedLine = Object.freeze({ at: performance.now(), text });
      const lines = stream === "stdout" ? stdout : stderr;
      lines.push(line);
      if (lines.length > this.opts.maxCapturedLines) lines.shift();
      this.opts.onOutputLine?.(name, stream, line);
    };

    let outcome: TaskCompleted;
    try {
      const result = await runner.run(task, { inputs: this.inputsFor(task), onLine });
      settled = true;
      const durationMs = performance.now() - startedAt;
      outcome = result.ok
        ? { kind: "success", durationMs, output: result.output }
        : { kind: "failed", durationMs, failure: frozenFailure(result.error, stdout, stderr) };
    } catch (err) {
      settled = true;
      const durationMs = performance.now() - startedAt;
      outcome = { kind: "failed", durationMs, failure: frozenFailure(errorMessage(err), stdout, stderr) };
    }

    if (outcome.kind === "success") this.outputs.set(name, outcome.output);
    return this.finish(cell, outcome);
  }

  private async failWithoutRunning(cell: TaskStateCell, error: string): Promise<TaskCompleted> {
    const startedAt = await cell.beginRun();
    this.opts.notifier.notify();
    return this.finish(cell, {
      kind: "failed",
      durationMs: performance.now() - startedAt,
      failure: frozenFailure(error, [], []),
    });
  }

  private async finish(cell: TaskStateCell, outcome: TaskCompleted): Promise<TaskCompleted> {
    await cell.complete(outcome);
    this.opts.notifier.notify();
    logger.debug(`Task "${cell.name}" completed`, { outcome: outcome.kind });
    return outcome;
  }

  private inputsFor(task: Readonly<TaskDefinition>): Record<string, JsonValue> {
    const inputs: Record<string, JsonValue> = {};
    for (const dep of task.dependsOn) {
      const output = this.outputs.get(dep);
      if (output !== undefined) inputs[dep] = output;
    }
    return inputs;
  }

  private cell(name: string): TaskStateCell {
    const cell = this.cells.get(name);
    if (!cell) throw new InvariantError("INVALID_TRANSITION", `No state cell for task "${name}"`);
    return cell;
  }
}

/** A failure holding copies of the captured lines, frozen with it. */
function frozenFailure(error: string, stdout: CapturedLine[], stderr: CapturedLine[]): TaskFailure {
  return Object.freeze({ error, stdout: Object.freeze([...stdout]), stderr: Object.freeze([...stderr]) });
}

export function summarize(outcomes: TaskCompleted[], durationMs: number): RunSummary {
  const summary: RunSummary = {
    total: outcomes.length,
    succeeded: 0,
    failed: 0,
    skipped: 0,
    dependencyFailed: 0,
    durationMs,
  };
  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case "success":
        summary.succeeded++;
        break;
      case "failed":
        summary.failed++;
        break;
      case "skipped":
        summary.skipped++;
        break;
      case "dependencyFailed":
        summary.dependencyFailed++;
        break;
    }
  }
  return summary;
}
