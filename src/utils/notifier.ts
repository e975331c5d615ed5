/**
 * Level-triggered broadcast wake-up. Carries no payload: a woken waiter must
 * re-read whatever state it cares about.
 */
export class Notifier {
  private gen = 0;
  private waiters: Array<() => void> = [];

  /** Incremented by every `notify()`. */
  get generation(): number {
    return this.gen;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  notify(): void {
    this.gen++;
    const woken = this.waiters;
    this.waiters = [];
    for (const wake of woken) wake();
  }

  /** Resolves on the next `notify()`. */
  notified(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Resolves once a notification newer than `generation` has happened,
   * immediately if one already has. Read `generation` before reading state,
   * then wait on it, and no notification in between is lost.
   */
  changedSince(generation: number): Promise<void> {
    if (this.gen > generation) return Promise.resolve();
    return this.notified();
  }
}
