import { performance } from "node:perf_hooks";
import { clearScreenDown, moveCursor } from "node:readline";
import { getConfig } from "../config.js";
import type { CapturedLine, Outputs, TaskCompleted, TaskStatus } from "../graph/types.js";
import type { TasksConfigInput, Verbosity } from "../schemas.js";
import { Tasks, type TasksOptions } from "../tasks.js";
import type { TasksStatus, UiOutput } from "./types.js";

export type TasksUiOptions = TasksOptions & {
  /** Where progress and the failure report go. Defaults to stderr. */
  output?: UiOutput;
};

/** Renders a run: a live table on a TTY, one line per change elsewhere. */
export class TasksUi {
  readonly tasks: Tasks;
  private output: UiOutput;

  constructor(tasks: Tasks, output: UiOutput = process.stderr) {
    this.tasks = tasks;
    this.output = output;
  }

  /** Build the engine and its reporter. In verbose mode task output is forwarded live. */
  static create(config: TasksConfigInput, verbosity: Verbosity = "normal", opts: TasksUiOptions = {}): TasksUi {
    const { output = process.stderr, ...engineOpts } = opts;
    const forward = opts.onOutputLine;
    const tasks = Tasks.create(config, verbosity, {
      ...engineOpts,
      onOutputLine: (name, stream, line) => {
        if (verbosity === "verbose") output.write(`[${name}] ${line.text}\n`);
        forward?.(name, stream, line);
      },
    });
    return new TasksUi(tasks, output);
  }

  get verbosity(): Verbosity {
    return this.tasks.verbosity;
  }

  async getTasksStatus(): Promise<TasksStatus> {
    const { statusWidth, nameWidth, durationWidth } = getConfig().ui;
    const status: TasksStatus = {
      lines: [],
      pending: 0,
      running: 0,
      succeeded: 0,
      failed: 0,
      skipped: 0,
      dependencyFailed: 0,
    };

    for (const { task, status: taskStatus } of await this.tasks.snapshot()) {
      if (taskStatus.state === "pending") {
        status.pending++;
        continue;
      }
      let durationMs: number | undefined;
      if (taskStatus.state === "running") {
        status.running++;
        durationMs = performance.now() - taskStatus.startedAt;
      } else {
        const outcome = taskStatus.outcome;
        countOutcome(status, outcome);
        durationMs = "durationMs" in outcome ? outcome.durationMs : undefined;
      }
      const duration = durationMs === undefined ? "" : `${Math.round(durationMs)}ms`;
      status.lines.push(
        `${statusLabel(taskStatus).padEnd(statusWidth)} ${task.name.padEnd(nameWidth)} ${duration.padEnd(durationWidth)}`.trimEnd(),
      );
    }

    return status;
  }

  /**
   * Drive the engine to completion while rendering. Resolves with the final
   * status counts and the outputs of successful tasks.
   */
  async run(): Promise<[TasksStatus, Outputs]> {
    const running = this.tasks.run();
    const finished = running.then(
      () => undefined,
      () => undefined,
    );

    if (this.verbosity === "quiet") {
      await this.waitUntilDone(finished, async () => undefined);
    } else {
      await this.renderUntilDone(finished);
    }

    const errors = await this.formatTaskErrors();
    if (errors) this.output.write(errors);

    const result = await running;
    return [await this.getTasksStatus(), result.outputs];
  }

  /** Failure report for every failed task, in topological order. */
  async formatTaskErrors(): Promise<string> {
    let errors = "";
    for (const { task, status } of await this.tasks.snapshot()) {
      if (status.state !== "completed" || status.outcome.kind !== "failed") continue;
      const { failure } = status.outcome;
      const startedAt = status.startedAt ?? 0;
      errors += `\n--- ${task.name} failed with error: ${failure.error}\n`;
      errors += `--- ${task.name} stdout:\n`;
      for (const line of failure.stdout) errors += formatCapturedLine(line, startedAt);
      errors += `--- ${task.name} stderr:\n`;
      for (const line of failure.stderr) errors += formatCapturedLine(line, startedAt);
      errors += "---\n";
    }
    return errors;
  }

  private async renderUntilDone(finished: Promise<void>): Promise<void> {
    const { statusWidth } = getConfig().ui;
    const isTty = this.output.isTTY === true && this.verbosity !== "verbose";
    const started = performance.now();
    const lastStatuses = new Map<string, string>();
    let lastHeight = 0;

    this.writeLine(`${"Running tasks".padEnd(statusWidth)} ${this.tasks.rootNames.join(", ")}\n`);

    await this.waitUntilDone(finished, async (status) => {
      const summary = formatSummary(status);
      if (isTty) {
        if (status.lines.length === 0) return;
        const padding = " ".repeat(Math.max(1, 19 + this.tasks.longestTaskName - summary.length));
        const elapsed = formatElapsed(performance.now() - started);
        if (lastHeight > 0) {
          moveCursor(this.output, 0, -lastHeight);
          clearScreenDown(this.output);
        }
        this.writeLine(`${status.lines.join("\n")}\n${summary}${padding}${elapsed}`);
        lastHeight = status.lines.length + 1;
        return;
      }

      for (const { task, status: taskStatus } of await this.tasks.snapshot()) {
        const key = changeKey(taskStatus);
        const previous = lastStatuses.get(task.name);
        lastStatuses.set(task.name, key);
        if (key === "Pending" || key === previous) continue;
        this.writeLine(`${statusLabel(taskStatus).padEnd(statusWidth)} ${task.name}${durationSuffix(taskStatus)}`);
      }
      if (status.pending === 0 && status.running === 0) this.writeLine(summary);
    });
  }

  /**
   * Call `render` with fresh counts after every change until nothing is
   * pending or running. Waiting also ends if the run itself settles.
   */
  private async waitUntilDone(
    finished: Promise<void>,
    render: (status: TasksStatus) => Promise<void>,
  ): Promise<void> {
    let settled = false;
    void finished.then(() => {
      settled = true;
    });
    for (;;) {
      const generation = this.tasks.notifier.generation;
      const status = await this.getTasksStatus();
      await render(status);
      if ((status.pending === 0 && status.running === 0) || settled) return;
      await Promise.race([this.tasks.notifier.changedSince(generation), finished]);
    }
  }

  private writeLine(message: string): void {
    this.output.write(`${message}\n`);
  }
}

function countOutcome(status: TasksStatus, outcome: TaskCompleted): void {
  switch (outcome.kind) {
    case "success":
      status.succeeded++;
      break;
    case "failed":
      status.failed++;
      break;
    case "skipped":
      status.skipped++;
      break;
    case "dependencyFailed":
      status.dependencyFailed++;
      break;
  }
}

export function statusLabel(status: TaskStatus): string {
  if (status.state === "pending") return "Pending";
  if (status.state === "running") return "Running";
  const outcome = status.outcome;
  switch (outcome.kind) {
    case "success":
      return "Succeeded";
    case "failed":
      return "Failed";
    case "skipped":
      return outcome.skipped.kind === "cached" ? "Cached" : "Not implemented";
    case "dependencyFailed":
      return "Dependency failed";
  }
}

function changeKey(status: TaskStatus): string {
  return `${statusLabel(status)}${durationSuffix(status)}`;
}

function durationSuffix(status: TaskStatus): string {
  if (status.state !== "completed") return "";
  const outcome = status.outcome;
  return "durationMs" in outcome ? ` (${formatElapsed(outcome.durationMs)})` : "";
}

export function formatSummary(status: TasksStatus): string {
  const parts: Array<[number, string]> = [
    [status.pending, "Pending"],
    [status.running, "Running"],
    [status.skipped, "Skipped"],
    [status.succeeded, "Succeeded"],
    [status.failed, "Failed"],
    [status.dependencyFailed, "Dependency Failed"],
  ];
  return parts
    .filter(([count]) => count > 0)
    .map(([count, label]) => `${count} ${label}`)
    .join(", ");
}

/** `12.34ms` below a second, `1.50s` above. */
export function formatElapsed(ms: number): string {
  return ms < 1000 ? `${ms.toFixed(2)}ms` : `${(ms / 1000).toFixed(2)}s`;
}

/** Seconds from task start to the line's arrival, zero-padded: `0001.25: text`. */
export function formatCapturedLine(line: CapturedLine, startedAt: number): string {
  const seconds = Math.max(0, line.at - startedAt) / 1000;
  return `${seconds.toFixed(2).padStart(7, "0")}: ${line.text}\n`;
}

export function hasFailures(status: TasksStatus): boolean {
  return status.failed > 0 || status.dependencyFailed > 0;
}
