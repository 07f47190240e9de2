/** Promise-chain mutex: tasks run one at a time in submission order. */
export class Mutex {
  private tail: Promise<unknown> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // The caller observes the rejection through `result`; the chain only needs to continue.
    this.tail = result.catch(() => undefined);
    return result;
  }
}

interface KeyedEntry {
  mutex: Mutex;
  users: number;
}

/** One mutex per key, dropped again once nothing holds or waits for it. */
export class KeyedMutex {
  private readonly locks = new Map<string, KeyedEntry>();

  get size(): number {
    return this.locks.size;
  }

  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), users: 0 };
      this.locks.set(key, entry);
    }
    const held = entry;
    held.users += 1;
    return held.mutex.runExclusive(task).finally(() => {
      held.users -= 1;
      if (held.users === 0 && this.locks.get(key) === held) {
        this.locks.delete(key);
      }
    });
  }
}
