interface Waiter<T> {
  resolve: (item: T | undefined) => void;
  timer: NodeJS.Timeout;
}

/**
 * Single-consumer async queue. `take` resolves with the next item, or with
 * `undefined` when the wait times out or `interrupt` is called.
 */
export class Mailbox<T> {
  private items: T[] = [];
  private waiter?: Waiter<T>;

  put(item: T): void {
    const waiter = this.release();
    if (waiter) {
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }

  take(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) return Promise.resolve(this.items.shift());
    if (this.waiter) return Promise.reject(new Error('Mailbox already has a consumer waiting'));
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = undefined;
        resolve(undefined);
      }, Math.max(0, timeoutMs));
      this.waiter = { resolve, timer };
    });
  }

  interrupt(): void {
    this.release()?.resolve(undefined);
  }

  drain(): T[] {
    const items = this.items;
    this.items = [];
    return items;
  }

  get size(): number {
    return this.items.length;
  }

  private release(): Waiter<T> | undefined {
    const waiter = this.waiter;
    if (!waiter) return undefined;
    this.waiter = undefined;
    clearTimeout(waiter.timer);
    return waiter;
  }
}
