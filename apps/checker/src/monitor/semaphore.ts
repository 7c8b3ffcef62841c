export type Release = () => void;

/**
 * Counting gate: at most `capacity` holders at a time. Waiters are admitted
 * in arrival order as slots free up.
 */
export class Semaphore {
  readonly capacity: number;
  private held = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(capacity: number) {
    this.capacity = Number.isFinite(capacity) ? Math.max(1, Math.trunc(capacity)) : 1;
  }

  get inUse(): number {
    return this.held;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<Release> {
    if (this.held < this.capacity) {
      this.held++;
    } else {
      // The releasing holder hands its slot over directly, so `held` is unchanged.
      await new Promise<void>((resolve) => {
        this.waiters.push(() => resolve());
      });
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  async use<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.held--;
  }
}
