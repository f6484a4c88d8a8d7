/**
 * Serialises async critical sections. Tasks run one after another in the
 * order `runExclusive` was called; a failing task rejects its own promise and
 * releases the lock for the next one.
 *
 * Not re-entrant: calling `runExclusive` from inside a task deadlocks.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
