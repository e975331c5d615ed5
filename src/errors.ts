export type ErrorCode =
  | "CYCLE_DETECTED"
  | "UNKNOWN_DEPENDENCY"
  | "DUPLICATE_TASK"
  | "TASK_NOT_FOUND"
  | "INVALID_CONFIG"
  | "CONFIG_NOT_FOUND"
  | "CACHE_UNAVAILABLE"
  | "INVALID_TRANSITION"
  | "ALREADY_STARTED";

/** Base class for every error the engine raises on its own behalf. */
export class TasklaneError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TasklaneError";
    this.code = code;
  }
}

export type GraphErrorCode = Extract<
  ErrorCode,
  "CYCLE_DETECTED" | "UNKNOWN_DEPENDENCY" | "DUPLICATE_TASK" | "TASK_NOT_FOUND"
>;

/** Raised while building the task graph; the engine is never created. */
export class GraphError extends TasklaneError {
  constructor(code: GraphErrorCode, message: string) {
    super(code, message);
    this.name = "GraphError";
  }
}

export class CycleDetectedError extends GraphError {
  /** Task names along the cycle, first name repeated at the end. */
  readonly path: string[];

  constructor(path: string[]) {
    super("CYCLE_DETECTED", `Task graph contains a cycle: ${path.join(" -> ")}`);
    this.name = "CycleDetectedError";
    this.path = path;
  }
}

export class UnknownDependencyError extends GraphError {
  readonly task: string;
  readonly dependency: string;

  constructor(task: string, dependency: string) {
    super("UNKNOWN_DEPENDENCY", `Task "${task}" depends on unknown task "${dependency}"`);
    this.name = "UnknownDependencyError";
    this.task = task;
    this.dependency = dependency;
  }
}

export class ConfigError extends TasklaneError {
  constructor(code: Extract<ErrorCode, "INVALID_CONFIG" | "CONFIG_NOT_FOUND">, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "ConfigError";
  }
}

export class CacheError extends TasklaneError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CACHE_UNAVAILABLE", message, options);
    this.name = "CacheError";
  }
}

/** A broken internal contract, e.g. a task started twice. */
export class InvariantError extends TasklaneError {
  constructor(code: Extract<ErrorCode, "INVALID_TRANSITION" | "ALREADY_STARTED">, message: string) {
    super(code, message);
    this.name = "InvariantError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
