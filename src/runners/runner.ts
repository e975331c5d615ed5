import type { JsonValue, OutputStream, TaskDefinition } from "../graph/types.js";

export type RunContext = {
  /** Outputs of the task's direct dependencies that succeeded. */
  inputs: Record<string, JsonValue>;
  /** Called once per captured line, without the trailing newline. */
  onLine: (stream: OutputStream, text: string) => void;
};

export type RunResult =
  | { ok: true; output: JsonValue }
  | { ok: false; error: string };

/**
 * Executes a task's action. The engine treats a run as opaque: it only sees
 * the lines reported through `onLine` and the final result.
 */
export interface TaskRunner {
  readonly name: string;
  /** Whether this runner has an action for the task. */
  canRun(task: Readonly<TaskDefinition>): boolean;
  run(task: Readonly<TaskDefinition>, context: RunContext): Promise<RunResult>;
}
