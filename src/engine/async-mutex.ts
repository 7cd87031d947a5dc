/**
 * FIFO async mutex.
 *
 * Serializes access to a non-reentrant resource. Waiters are granted the
 * lock strictly in arrival order.
 */

export type ReleaseFn = () => void;

export class AsyncMutex {
  private locked = false;
  private readonly waiters: Array<(release: ReleaseFn) => void> = [];

  /**
   * Acquire the lock. Resolves with a release function that must be
   * called exactly once; extra calls are ignored.
   */
  public acquire(): Promise<ReleaseFn> {
    return new Promise<ReleaseFn>((resolve) => {
      if (!this.locked) {
        this.locked = true;
        resolve(this.createRelease());
        return;
      }

      this.waiters.push(resolve);
    });
  }

  /**
   * Run `task` while holding the lock.
   */
  public async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  public isLocked(): boolean {
    return this.locked;
  }

  /**
   * Number of callers waiting for the lock.
   */
  public getQueueLength(): number {
    return this.waiters.length;
  }

  private createRelease(): ReleaseFn {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // Hand over without unlocking so no late arrival can jump the queue.
        next(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }
}
