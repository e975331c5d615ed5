import type { CapturedLine, OutputStream, Outputs } from "../graph/types.js";
import type { CacheOracle, Fingerprinter } from "../persistence/types.js";
import type { TaskRunner } from "../runners/runner.js";
import type { Notifier } from "../utils/notifier.js";

export type ExecutionOptions = {
  runners: TaskRunner[];
  notifier: Notifier;
  fingerprint: Fingerprinter;
  cache?: CacheOracle;
  /** Lines kept per stream for a failure report. */
  maxCapturedLines: number;
  onOutputLine?: (taskName: string, stream: OutputStream, line: CapturedLine) => void;
};

export type RunSummary = {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  dependencyFailed: number;
  durationMs: number;
};

export type ExecutionResult = {
  summary: RunSummary;
  outputs: Outputs;
};
