import { beforeEach, describe, expect, it } from "vitest";
import { resetConfig } from "../../src/config.js";
import type { OutputStream } from "../../src/graph/types.js";
import { ShellRunner } from "../../src/runners/shell-runner.js";

const node = `'${process.execPath}'`;

function script(source: string): string {
  return `${node} -e '${source}'`;
}

function collect(): { lines: string[]; onLine: (stream: OutputStream, text: string) => void } {
  const lines: string[] = [];
  return { lines, onLine: (stream, text) => lines.push(`${stream}:${text}`) };
}

describe("ShellRunner", () => {
  beforeEach(() => {
    resetConfig();
  });

  it("accepts only tasks with a non-blank command", () => {
    const runner = new ShellRunner();
    expect(runner.canRun({ name: "a", dependsOn: [], command: "true" })).toBe(true);
    expect(runner.canRun({ name: "a", dependsOn: [], command: "  " })).toBe(false);
    expect(runner.canRun({ name: "a", dependsOn: [] })).toBe(false);
  });

  it("streams stdout and stderr line by line", async () => {
    const runner = new ShellRunner();
    const { lines, onLine } = collect();

    const result = await runner.run(
      { name: "a", dependsOn: [], command: script('console.log("one\\ntwo"); console.error("oops")') },
      { inputs: {}, onLine },
    );

    expect(result).toEqual({ ok: true, output: null });
    expect(lines.filter((l) => l.startsWith("stdout:"))).toEqual(["stdout:one", "stdout:two"]);
    expect(lines.filter((l) => l.startsWith("stderr:"))).toEqual(["stderr:oops"]);
  });

  it("reads the task output from the output file", async () => {
    const runner = new ShellRunner();
    const command = script(
      'require("fs").writeFileSync(process.env.TASKLANE_OUTPUT_FILE, JSON.stringify({ built: 3 }))',
    );

    const result = await runner.run({ name: "a", dependsOn: [], command }, { inputs: {}, onLine: collect().onLine });

    expect(result).toEqual({ ok: true, output: { built: 3 } });
  });

  it("passes dependency outputs and task env to the command", async () => {
    const runner = new ShellRunner({ env: { SHARED: "base" } });
    const { lines, onLine } = collect();

    await runner.run(
      {
        name: "a",
        dependsOn: ["setup"],
        env: { LOCAL: "mine" },
        command: script("console.log(process.env.TASKLANE_INPUTS); console.log(process.env.SHARED + process.env.LOCAL)"),
      },
      { inputs: { setup: { ready: true } }, onLine },
    );

    expect(lines).toEqual(['stdout:{"setup":{"ready":true}}', "stdout:basemine"]);
  });

  it("reports a non-zero exit code", async () => {
    const runner = new ShellRunner();
    const result = await runner.run(
      { name: "a", dependsOn: [], command: script("process.exit(3)") },
      { inputs: {}, onLine: collect().onLine },
    );
    expect(result).toEqual({ ok: false, error: "Command exited with code 3" });
  });

  it("fails when the output file is not JSON", async () => {
    const runner = new ShellRunner();
    const command = script('require("fs").writeFileSync(process.env.TASKLANE_OUTPUT_FILE, "not json")');

    const result = await runner.run({ name: "a", dependsOn: [], command }, { inputs: {}, onLine: collect().onLine });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toMatch(/^Task output is not valid JSON: /);
  });
});
