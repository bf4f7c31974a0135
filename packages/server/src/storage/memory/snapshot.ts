import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Memory repositories that can roll back to a copy of their state
 */
export interface Snapshottable {
  snapshot(): () => void;
}

/**
 * Serializes async critical sections in-process.
 *
 * Reentrant: a call made from inside a held section runs straight away
 * instead of queueing behind the section that is waiting on it.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private readonly owner = new AsyncLocalStorage<{ held: boolean }>();

  async run<T>(fn: () => Promise<T>): Promise<T> {
    if (this.owner.getStore()?.held) {
      return fn();
    }

    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    // Work started inside the section but still running after it ends must queue again
    const lease = { held: true };
    try {
      return await this.owner.run(lease, fn);
    } finally {
      lease.held = false;
      release();
    }
  }
}

/**
 * Base for memory repositories sharing one storage-wide lock.
 *
 * Every public call takes the lock, so a write outside a transaction waits
 * for an open transaction to commit or roll back instead of being erased by
 * its rollback.
 */
export abstract class LockedRepository implements Snapshottable {
  constructor(protected readonly lock: Mutex) {}

  abstract snapshot(): () => void;
}
