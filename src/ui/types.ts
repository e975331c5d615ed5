/** Counts by status plus the rendered table rows of non-pending tasks. */
export type TasksStatus = {
  lines: string[];
  pending: number;
  running: number;
  succeeded: number;
  failed: number;
  skipped: number;
  dependencyFailed: number;
};

export type UiOutput = NodeJS.WritableStream & {
  isTTY?: boolean;
};
