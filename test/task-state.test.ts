import { describe, expect, it } from "vitest";
import { InvariantError } from "../src/errors.js";
import { TaskStateCell } from "../src/graph/task-state.js";
import type { TaskStatus } from "../src/graph/types.js";

function cell(): TaskStateCell {
  return new TaskStateCell({ name: "build", dependsOn: [] });
}

describe("TaskStateCell", () => {
  it("starts pending", async () => {
    const state = await cell().read();
    expect(state.status).toEqual({ state: "pending" });
    expect(state.task.name).toBe("build");
  });

  it("moves pending -> running -> completed", async () => {
    const c = cell();
    const startedAt = await c.beginRun();
    expect(await c.read()).toMatchObject({ status: { state: "running", startedAt } });

    await c.complete({ kind: "success", durationMs: 5, output: null });
    const { status } = await c.read();
    expect(status).toEqual({
      state: "completed",
      outcome: { kind: "success", durationMs: 5, output: null },
      startedAt,
    });
  });

  it("completes a skip straight from pending", async () => {
    const c = cell();
    await c.complete({ kind: "skipped", skipped: { kind: "cached", fingerprint: "abc" } });
    expect((await c.read()).status).toEqual({
      state: "completed",
      outcome: { kind: "skipped", skipped: { kind: "cached", fingerprint: "abc" } },
      startedAt: undefined,
    });
  });

  it("refuses to start twice", async () => {
    const c = cell();
    await c.beginRun();
    await expect(c.beginRun()).rejects.toThrow(InvariantError);
    await expect(c.beginRun()).rejects.toThrow('Task "build" cannot start from state "running"');
  });

  it("refuses to change a completed status", async () => {
    const c = cell();
    await c.complete({ kind: "dependencyFailed" });
    await expect(c.complete({ kind: "dependencyFailed" })).rejects.toThrow(
      'Task "build" cannot complete as "dependencyFailed" from state "completed"',
    );
    await expect(c.beginRun()).rejects.toThrow(InvariantError);
  });

  it("refuses success without running and skips after starting", async () => {
    await expect(cell().complete({ kind: "success", durationMs: 1, output: null })).rejects.toThrow(
      'Task "build" cannot complete as "success" from state "pending"',
    );
    const running = cell();
    await running.beginRun();
    await expect(running.complete({ kind: "skipped", skipped: { kind: "notImplemented" } })).rejects.toThrow(
      InvariantError,
    );
  });

  it("returns frozen snapshots", async () => {
    const c = cell();
    const before = await c.read();
    await c.beginRun();
    expect(before.status).toEqual({ state: "pending" });
    expect(Object.isFrozen(before.status)).toBe(true);
  });

  it("never hands concurrent readers a torn status", async () => {
    const c = cell();
    await c.beginRun();

    const reads: Promise<{ status: TaskStatus }>[] = [];
    for (let i = 0; i < 50; i++) reads.push(c.read());
    const write = c.complete({
      kind: "failed",
      durationMs: 3,
      failure: { error: "boom", stdout: [], stderr: [] },
    });
    for (let i = 0; i < 50; i++) reads.push(c.read());
    await write;

    const results = await Promise.all(reads);
    for (const { status } of results) {
      if (status.state === "running") {
        expect(Object.keys(status).sort()).toEqual(["startedAt", "state"]);
      } else {
        expect(status).toMatchObject({
          state: "completed",
          outcome: { kind: "failed", durationMs: 3, failure: { error: "boom" } },
        });
      }
    }
    // readers queued before the write see the old value, those after see the new one
    expect(results.slice(0, 50).every(({ status }) => status.state === "running")).toBe(true);
    expect(results.slice(50).every(({ status }) => status.state === "completed")).toBe(true);
  });
});
