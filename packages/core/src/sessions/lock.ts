/**
 * Exclusive section for one session: tasks run one at a time, in the
 * order they were submitted. A failing task does not block later ones.
 */
export class SessionLock {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
