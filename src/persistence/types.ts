import type { TaskDefinition } from "../graph/types.js";

/**
 * Answers whether a task with the given fingerprint already succeeded.
 * The scheduler only ever looks up; recording results is up to the caller.
 */
export interface CacheOracle {
  lookup(fingerprint: string): boolean | Promise<boolean>;
}

/** A cache the caller can also populate after a run. */
export interface CacheWriter extends CacheOracle {
  record(taskName: string, fingerprint: string): void | Promise<void>;
}

/** Derives a task's fingerprint; `undefined` means the task is not cacheable. */
export type Fingerprinter = (
  task: Readonly<TaskDefinition>,
) => string | undefined | Promise<string | undefined>;

export type CachedTask = {
  taskName: string;
  fingerprint: string;
};
