import { describe, expect, it } from "vitest";
import { Notifier } from "../src/utils/notifier.js";

describe("Notifier", () => {
  it("wakes every registered waiter", async () => {
    const notifier = new Notifier();
    const woken: string[] = [];
    const a = notifier.notified().then(() => woken.push("a"));
    const b = notifier.notified().then(() => woken.push("b"));
    expect(notifier.waiting).toBe(2);

    notifier.notify();
    await Promise.all([a, b]);

    expect(woken.sort()).toEqual(["a", "b"]);
    expect(notifier.waiting).toBe(0);
    expect(notifier.generation).toBe(1);
  });

  it("does not wake waiters registered after a notification", async () => {
    const notifier = new Notifier();
    notifier.notify();
    let woken = false;
    void notifier.notified().then(() => {
      woken = true;
    });

    await Promise.resolve();
    expect(woken).toBe(false);
    expect(notifier.waiting).toBe(1);
  });

  it("resolves changedSince immediately when a notification was missed", async () => {
    const notifier = new Notifier();
    const seen = notifier.generation;
    notifier.notify();

    await expect(notifier.changedSince(seen)).resolves.toBeUndefined();
    expect(notifier.waiting).toBe(0);
  });

  it("waits in changedSince when nothing happened yet", async () => {
    const notifier = new Notifier();
    const pending = notifier.changedSince(notifier.generation);
    expect(notifier.waiting).toBe(1);

    notifier.notify();
    await expect(pending).resolves.toBeUndefined();
  });
});
