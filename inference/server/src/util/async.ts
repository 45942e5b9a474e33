/**
 * Promise-based coordination primitives for the single event loop
 */

export interface Mutex {
  runExclusive<T>(task: () => Promise<T>): Promise<T>;
  readonly locked: boolean;
}

/**
 * FIFO mutex: tasks run one at a time in call order
 */
export function createMutex(): Mutex {
  let tail: Promise<void> = Promise.resolve();
  let pending = 0;

  return {
    async runExclusive<T>(task: () => Promise<T>): Promise<T> {
      pending++;
      const previous = tail;
      let releaseNext: () => void = () => undefined;
      tail = new Promise<void>((resolve) => {
        releaseNext = resolve;
      });

      await previous;
      try {
        return await task();
      } finally {
        pending--;
        releaseNext();
      }
    },
    get locked() {
      return pending > 0;
    },
  };
}

export interface Semaphore {
  /**
   * Wait for a slot. Rejects with the signal's reason if aborted while queued.
   */
  acquire(signal?: AbortSignal): Promise<() => void>;
  readonly available: number;
  readonly waiting: number;
}

/**
 * Counting semaphore with a FIFO wait queue
 */
export function createSemaphore(capacity: number): Semaphore {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
  }

  let available = capacity;
  const queue: Array<{ grant: () => void }> = [];

  function releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = queue.shift();
      if (next) {
        next.grant();
      } else {
        available++;
      }
    };
  }

  function acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    if (available > 0) {
      available--;
      return Promise.resolve(releaser());
    }

    return new Promise((resolve, reject) => {
      const entry = {
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve(releaser());
        },
      };
      const onAbort = () => {
        const index = queue.indexOf(entry);
        if (index >= 0) queue.splice(index, 1);
        reject(signal?.reason);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      queue.push(entry);
    });
  }

  return {
    acquire,
    get available() {
      return available;
    },
    get waiting() {
      return queue.length;
    },
  };
}
