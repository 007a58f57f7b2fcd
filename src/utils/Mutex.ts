// Serializes async critical sections on a single promise chain.
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // Keep the chain alive whether or not this task fails.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
