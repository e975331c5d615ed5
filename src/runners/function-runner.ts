import { errorMessage } from "../errors.js";
import type { JsonValue, OutputStream, TaskDefinition } from "../graph/types.js";
import { log } from "../utils/logger.js";
import type { RunContext, RunResult, TaskRunner } from "./runner.js";

const logger = log.child("function-runner");

export type TaskFunctionContext = {
  task: Readonly<TaskDefinition>;
  inputs: Record<string, JsonValue>;
  /** Report output; multi-line text is split into one line per entry. */
  emit: (stream: OutputStream, text: string) => void;
};

/**
 * An in-process task action. Resolving means success (the value becomes
 * the task's output), throwing means failure.
 */
export type TaskFunction = (ctx: TaskFunctionContext) => Promise<JsonValue | undefined>;

/** Runs tasks by name through registered functions. */
export class FunctionRunner implements TaskRunner {
  readonly name = "function";
  private fns = new Map<string, TaskFunction>();

  constructor(fns?: Record<string, TaskFunction>) {
    for (const [name, fn] of Object.entries(fns ?? {})) this.register(name, fn);
  }

  register(taskName: string, fn: TaskFunction): this {
    this.fns.set(taskName, fn);
    return this;
  }

  canRun(task: Readonly<TaskDefinition>): boolean {
    return this.fns.has(task.name);
  }

  async run(task: Readonly<TaskDefinition>, context: RunContext): Promise<RunResult> {
    const fn = this.fns.get(task.name);
    if (!fn) return { ok: false, error: `No function registered for task "${task.name}"` };

    const emit = (stream: OutputStream, text: string): void => {
      for (const line of text.split(/\r?\n/)) context.onLine(stream, line);
    };

    try {
      const output = await fn({ task, inputs: context.inputs, emit });
      return { ok: true, output: output ?? null };
    } catch (err) {
      logger.debug(`Task "${task.name}" threw`, { error: errorMessage(err) });
      return { ok: false, error: errorMessage(err) };
    }
  }
}
