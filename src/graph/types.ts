export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type TaskDefinition = {
  name: string;
  /** Tasks that must complete before this one. */
  dependsOn: string[];
  /** Tasks that must not start before this one completes. */
  before?: string[];
  command?: string;
  description?: string;
  /** Files whose contents feed the task's fingerprint. */
  inputs?: string[];
  cwd?: string;
  env?: Record<string, string>;
};

export type CapturedLine = {
  /** Monotonic arrival time, same clock as `startedAt`. */
  at: number;
  text: string;
};

export type TaskFailure = {
  readonly error: string;
  readonly stdout: readonly CapturedLine[];
  readonly stderr: readonly CapturedLine[];
};

export type Skipped =
  | { kind: "cached"; fingerprint: string }
  | { kind: "notImplemented" };

export type TaskCompleted =
  | { kind: "success"; durationMs: number; output: JsonValue }
  | { kind: "failed"; durationMs: number; failure: TaskFailure }
  | { kind: "skipped"; skipped: Skipped }
  | { kind: "dependencyFailed" };

export type TaskStatus =
  | { state: "pending" }
  | { state: "running"; startedAt: number }
  | { state: "completed"; outcome: TaskCompleted; startedAt?: number };

export type TaskState = {
  readonly task: Readonly<TaskDefinition>;
  readonly status: TaskStatus;
};

/** Outputs of every task that completed with `success`, by task name. */
export type Outputs = Record<string, JsonValue>;

export type OutputStream = "stdout" | "stderr";

export function isTerminal(status: TaskStatus): status is Extract<TaskStatus, { state: "completed" }> {
  return status.state === "completed";
}

/** Whether dependents of a task with this outcome may run. */
export function unblocksDependents(outcome: TaskCompleted): boolean {
  return outcome.kind === "success" || outcome.kind === "skipped";
}
