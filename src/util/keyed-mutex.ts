/**
 * Async mutex per key: work for one key runs in submission order, work for
 * different keys runs concurrently
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string | number, fn: () => Promise<T>): Promise<T> {
    const id = String(key);
    const previous = this.tails.get(id) ?? Promise.resolve();
    const run = previous.then(() => fn());
    // the next waiter only needs to know this turn is over
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(id, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(id) === tail) this.tails.delete(id);
    }
  }

  isLocked(key: string | number): boolean {
    return this.tails.has(String(key));
  }
}
