import { execa } from "execa";
import { once } from "node:events";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import type { JsonValue, OutputStream, TaskDefinition } from "../graph/types.js";
import { log } from "../utils/logger.js";
import type { RunContext, RunResult, TaskRunner } from "./runner.js";

const logger = log.child("shell-runner");

export type ShellRunnerOptions = {
  /** `true` for the platform shell, or a shell path. Defaults to config. */
  shell?: boolean | string;
  /** Extra environment for every task, below the task's own `env`. */
  env?: Record<string, string>;
};

/**
 * Runs a task's `command` in a subprocess and reports stdout and stderr one
 * line at a time. The task may write JSON to the file named by the output
 * env var; that JSON becomes its output.
 */
export class ShellRunner implements TaskRunner {
  readonly name = "shell";
  private shell: boolean | string;
  private env: Record<string, string>;

  constructor(opts: ShellRunnerOptions = {}) {
    this.shell = opts.shell ?? getConfig().runner.shell;
    this.env = opts.env ?? {};
  }

  canRun(task: Readonly<TaskDefinition>): boolean {
    return typeof task.command === "string" && task.command.trim().length > 0;
  }

  async run(task: Readonly<TaskDefinition>, context: RunContext): Promise<RunResult> {
    const command = task.command;
    if (!command) return { ok: false, error: `Task "${task.name}" has no command` };

    const { outputEnvVar, inputsEnvVar } = getConfig().runner;
    const dir = await mkdtemp(join(tmpdir(), "tasklane-"));
    const outputFile = join(dir, "output.json");

    try {
      logger.debug(`Spawning "${task.name}"`, { command, cwd: task.cwd });
      const subprocess = execa(command, {
        shell: this.shell,
        cwd: task.cwd,
        env: {
          ...this.env,
          ...task.env,
          [outputEnvVar]: outputFile,
          [inputsEnvVar]: JSON.stringify(context.inputs),
        },
        stdin: "ignore",
        buffer: false,
        reject: false,
      });

      const [result] = await Promise.all([
        subprocess,
        pipeLines(subprocess.stdout, "stdout", context),
        pipeLines(subprocess.stderr, "stderr", context),
      ]);

      if (result.failed) {
        return { ok: false, error: describeFailure(result) };
      }
      return { ok: true, output: await readOutput(outputFile) };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}

async function pipeLines(stream: Readable | null, name: OutputStream, context: RunContext): Promise<void> {
  if (!stream) return;
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  lines.on("line", (line) => context.onLine(name, line));
  await once(lines, "close");
}

function describeFailure(result: { exitCode?: number; signal?: string; shortMessage: string }): string {
  if (result.signal) return `Command terminated by signal ${result.signal}`;
  if (typeof result.exitCode === "number" && result.exitCode !== 0) {
    return `Command exited with code ${result.exitCode}`;
  }
  return result.shortMessage;
}

async function readOutput(path: string): Promise<JsonValue> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch {
    // the task never wrote an output file
    return null;
  }
  if (raw.trim() === "") return null;
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(`Task output is not valid JSON: ${errorMessage(err)}`);
  }
}
