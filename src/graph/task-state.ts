import { performance } from "node:perf_hooks";
import { InvariantError } from "../errors.js";
import { RwLock } from "../utils/rw-lock.js";
import type { TaskCompleted, TaskDefinition, TaskState, TaskStatus } from "./types.js";

const PENDING: TaskStatus = Object.freeze({ state: "pending" });

/**
 * Per-task status behind a read/write lock. Status values are frozen and
 * replaced whole, so a snapshot never changes after it is returned.
 */
export class TaskStateCell {
  readonly task: Readonly<TaskDefinition>;
  private status: TaskStatus = PENDING;
  private readonly lock = new RwLock();

  constructor(task: Readonly<TaskDefinition>) {
    this.task = task;
  }

  get name(): string {
    return this.task.name;
  }

  read(): Promise<TaskState> {
    return this.lock.read(() => ({ task: this.task, status: this.status }));
  }

  /** `pending → running(now)`. Returns the start timestamp. */
  beginRun(): Promise<number> {
    return this.lock.write(() => {
      if (this.status.state !== "pending") {
        throw new InvariantError(
          "INVALID_TRANSITION",
          `Task "${this.name}" cannot start from state "${this.status.state}"`,
        );
      }
      const startedAt = performance.now();
      this.status = Object.freeze({ state: "running", startedAt });
      return startedAt;
    });
  }

  /**
   * `running → completed` for success and failure, `pending → completed`
   * for skips and dependency failures.
   */
  complete(outcome: TaskCompleted): Promise<void> {
    return this.lock.write(() => {
      const current = this.status;
      const ranToCompletion = outcome.kind === "success" || outcome.kind === "failed";
      const expected = ranToCompletion ? "running" : "pending";
      if (current.state !== expected) {
        throw new InvariantError(
          "INVALID_TRANSITION",
          `Task "${this.name}" cannot complete as "${outcome.kind}" from state "${current.state}"`,
        );
      }
      this.status = Object.freeze({
        state: "completed",
        outcome: Object.freeze(outcome),
        startedAt: current.state === "running" ? current.startedAt : undefined,
      });
    });
  }
}
