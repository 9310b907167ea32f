interface Waiter {
  priority: number;
  seq: number;
  grant: () => void;
}

/**
 * Counting semaphore. Waiters with a higher priority are served first,
 * equal priorities in arrival order.
 */
export class Semaphore {
  private inUse = 0;
  private seq = 0;
  private waiters: Waiter[] = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError('capacity must be a positive integer');
    }
  }

  get active(): number {
    return this.inUse;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  /** Resolves with a release function once a slot is free. */
  acquire(priority = 0): Promise<() => void> {
    return new Promise((resolve) => {
      const grant = () => {
        this.inUse++;
        let released = false;
        resolve(() => {
          if (released) return;
          released = true;
          this.inUse--;
          this.next();
        });
      };

      if (this.inUse < this.capacity && this.waiters.length === 0) {
        grant();
        return;
      }
      this.waiters.push({ priority, seq: this.seq++, grant });
      this.waiters.sort((a, b) => b.priority - a.priority || a.seq - b.seq);
    });
  }

  private next(): void {
    while (this.inUse < this.capacity) {
      const waiter = this.waiters.shift();
      if (!waiter) return;
      waiter.grant();
    }
  }
}
