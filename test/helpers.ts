import type { TaskState } from "../src/graph/types.js";
import type { Tasks } from "../src/tasks.js";

export function stateOf(tasks: Tasks, name: string): Promise<TaskState> {
  const cell = tasks.cell(name);
  if (!cell) throw new Error(`no cell for ${name}`);
  return cell.read();
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/** A promise plus the function that resolves it. */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
