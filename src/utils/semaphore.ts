/**
 * Counting semaphore bounding concurrent upstream calls. Waiters are served
 * in arrival order.
 */
export class Semaphore {
  private active = 0;
  private waiters: Array<() => void> = [];

  constructor(private readonly capacity: number) {}

  async acquire(): Promise<() => void> {
    if (this.active < this.capacity) {
      this.active++;
      return this.releaser();
    }
    await new Promise<void>(resolve => this.waiters.push(resolve));
    return this.releaser();
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Slot is handed over directly; `active` stays unchanged.
        next();
      } else {
        this.active--;
      }
    };
  }

  get inUse(): number {
    return this.active;
  }

  get waiting(): number {
    return this.waiters.length;
  }
}
