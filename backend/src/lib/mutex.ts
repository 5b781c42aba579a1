import { TransientConflictError } from './errors';

export type Release = () => void;

interface Waiter {
  grant: () => void;
}

/**
 * FIFO async mutex keyed by string. Keys never block each other.
 * A waiter that is not granted within `timeoutMs` leaves the queue and
 * rejects with TransientConflictError.
 */
export class KeyedMutex {
  private readonly held = new Set<string>();
  private readonly queues = new Map<string, Waiter[]>();

  acquire(key: string, timeoutMs: number): Promise<Release> {
    if (!this.held.has(key)) {
      this.held.add(key);
      return Promise.resolve(this.releaser(key));
    }

    return new Promise<Release>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          clearTimeout(timer);
          resolve(this.releaser(key));
        },
      };

      const timer = setTimeout(() => {
        const queue = this.queues.get(key);
        if (queue) {
          const index = queue.indexOf(waiter);
          if (index >= 0) queue.splice(index, 1);
          if (queue.length === 0) this.queues.delete(key);
        }
        reject(new TransientConflictError(`Timed out after ${timeoutMs}ms waiting for lock on ${key}`));
      }, timeoutMs);

      const queue = this.queues.get(key) ?? [];
      queue.push(waiter);
      this.queues.set(key, queue);
    });
  }

  async runExclusive<T>(key: string, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key, timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  pending(key: string): number {
    return this.queues.get(key)?.length ?? 0;
  }

  private releaser(key: string): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const queue = this.queues.get(key);
      const next = queue?.shift();
      if (queue && queue.length === 0) this.queues.delete(key);

      if (next) {
        next.grant();
      } else {
        this.held.delete(key);
      }
    };
  }
}
