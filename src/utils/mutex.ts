/**
 * Promise-chain mutex.
 *
 * Serializes async critical sections that span await points. The chain
 * survives a failed section so one rejection never wedges later callers.
 */
export class Mutex {
  private chain: Promise<void> = Promise.resolve();
  private held = false;

  get isLocked(): boolean {
    return this.held;
  }

  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const run = this.chain.then(async () => {
      this.held = true;
      try {
        return await fn();
      } finally {
        this.held = false;
      }
    });
    this.chain = run.then(() => undefined, () => undefined);
    return run;
  }
}
