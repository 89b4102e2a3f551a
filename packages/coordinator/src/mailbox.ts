/**
 * Runs posted tasks one at a time, in posting order. Each transaction gets
 * its own mailbox so that transitions on it never overlap.
 */
export class Mailbox {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  /** Number of tasks posted and not yet settled. */
  get pending(): number {
    return this.queued;
  }

  post<T>(task: () => T | Promise<T>): Promise<T> {
    this.queued++;
    const run = this.tail.then(task).finally(() => {
      this.queued--;
    });
    // The next task waits for this one to settle; a failure reaches the poster through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
