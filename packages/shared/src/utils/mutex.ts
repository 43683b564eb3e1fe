/** Serializes async sections: each one starts after the previous settles. */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(fn, fn);
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }
}

/** One {@link Mutex} per key; idle keys are dropped. */
export class KeyedMutex {
  private locks = new Map<string, { mutex: Mutex; pending: number }>();

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), pending: 0 };
      this.locks.set(key, entry);
    }
    entry.pending += 1;
    try {
      return await entry.mutex.runExclusive(fn);
    } finally {
      entry.pending -= 1;
      if (entry.pending === 0) this.locks.delete(key);
    }
  }
}
