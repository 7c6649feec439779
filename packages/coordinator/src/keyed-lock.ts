// Per-key exclusive sections. Waiters on the same key run one at a time in
// arrival order; different keys never wait on each other.

export class LockTimeoutError extends Error {
  public readonly key: string;

  public constructor(key: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for ${key}`);
    this.name = "LockTimeoutError";
    this.key = key;
  }
}

type Waiter = {
  grant: () => void;
};

export class KeyedLock {
  // The head of each queue holds the section; the rest are waiting.
  private readonly queues = new Map<string, Waiter[]>();

  /**
   * Run `work` inside the section for `key`. The waiter is queued before this
   * method returns, so calls made in order enter the section in that order.
   * A waiter still queued after `timeoutMs` is dropped and rejects with
   * LockTimeoutError without running.
   */
  public run<T>(key: string, timeoutMs: number, work: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const queue = this.queues.get(key) ?? [];
      this.queues.set(key, queue);

      let timer: NodeJS.Timeout | undefined;

      const waiter: Waiter = {
        grant: () => {
          if (timer) {
            clearTimeout(timer);
          }

          void Promise.resolve()
            .then(work)
            .then(resolve, reject)
            .finally(() => this.release(key, waiter));
        }
      };

      queue.push(waiter);

      if (queue.length === 1) {
        waiter.grant();
        return;
      }

      timer = setTimeout(() => {
        const index = queue.indexOf(waiter);
        if (index <= 0) {
          return;
        }

        queue.splice(index, 1);
        reject(new LockTimeoutError(key, timeoutMs));
      }, timeoutMs);
    });
  }

  public isHeld(key: string): boolean {
    return this.queues.has(key);
  }

  public activeKeyCount(): number {
    return this.queues.size;
  }

  private release(key: string, waiter: Waiter): void {
    const queue = this.queues.get(key);
    if (!queue || queue[0] !== waiter) {
      return;
    }

    queue.shift();

    const next = queue[0];
    if (next) {
      next.grant();
      return;
    }

    this.queues.delete(key);
  }
}
