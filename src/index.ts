// Config
export { getConfig, configure, resetConfig, defaults } from "./config.js";
export type { TasklaneConfig } from "./config.js";

// Errors
export {
  TasklaneError,
  GraphError,
  CycleDetectedError,
  UnknownDependencyError,
  ConfigError,
  CacheError,
  InvariantError,
} from "./errors.js";
export type { ErrorCode, GraphErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  TaskDefinitionSchema,
  TasksConfigSchema,
  TasksFileSchema,
  VerbositySchema,
} from "./schemas.js";
export type { TasksConfig, TasksConfigInput, TasksFile, Verbosity } from "./schemas.js";
export { loadTasksFile, toTasksConfig } from "./loader.js";

// Core
export { Tasks } from "./tasks.js";
export type { TasksOptions } from "./tasks.js";
export { TaskGraph, createTaskGraph } from "./graph/task-graph.js";
export { TaskStateCell } from "./graph/task-state.js";
export { isTerminal, unblocksDependents } from "./graph/types.js";
export type {
  CapturedLine,
  JsonValue,
  OutputStream,
  Outputs,
  Skipped,
  TaskCompleted,
  TaskDefinition,
  TaskFailure,
  TaskState,
  TaskStatus,
} from "./graph/types.js";
export { Executor, summarize } from "./executor/executor.js";
export type { ExecutionOptions, ExecutionResult, RunSummary } from "./executor/types.js";

// Runners
export type { RunContext, RunResult, TaskRunner } from "./runners/runner.js";
export { ShellRunner } from "./runners/shell-runner.js";
export type { ShellRunnerOptions } from "./runners/shell-runner.js";
export { FunctionRunner } from "./runners/function-runner.js";
export type { TaskFunction, TaskFunctionContext } from "./runners/function-runner.js";

// Cache
export { CacheStore } from "./persistence/store.js";
export { fingerprintTask } from "./persistence/fingerprint.js";
export type { CachedTask, CacheOracle, CacheWriter, Fingerprinter } from "./persistence/types.js";
export { MemoryCache } from "./utils/cache.js";
export type { MemoryCacheOptions } from "./utils/cache.js";

// UI
export { TasksUi, formatCapturedLine, formatElapsed, formatSummary, hasFailures, statusLabel } from "./ui/tasks-ui.js";
export type { TasksUiOptions } from "./ui/tasks-ui.js";
export type { TasksStatus, UiOutput } from "./ui/types.js";

// Utils
export { log, setLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { Notifier } from "./utils/notifier.js";
export { RwLock } from "./utils/rw-lock.js";
