/**
 * Exclusive lock for async critical sections. Tasks run one at a time in
 * acquisition order, and always on a later microtask than the caller.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  get pending(): number {
    return this.waiting;
  }

  runExclusive<T>(task: () => T | PromiseLike<T>): Promise<T> {
    this.waiting += 1;
    const run = this.tail.then(() => {
      this.waiting -= 1;
      return task();
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
