import { Mutex } from 'async-mutex';

/**
 * One Mutex per key, created on first use. Work on different keys runs
 * independently; work on the same key is serialized in arrival order.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, Mutex>();

  constructor(private readonly nameSpace: string) {}

  private getLock(key: string): Mutex {
    let mutex = this.locks.get(key);
    if (mutex === undefined) {
      mutex = new Mutex();
      this.locks.set(key, mutex);
    }
    return mutex;
  }

  async runExclusive<T>(key: string, callback: () => T | Promise<T>): Promise<T> {
    const mutex = this.getLock(key);
    if (mutex.isLocked()) {
      console.debug(`Waiting for ${this.nameSpace} lock on ${key}`);
    }
    return mutex.runExclusive(callback);
  }

  isLocked(key: string): boolean {
    return this.locks.get(key)?.isLocked() ?? false;
  }
}
