/** Unbounded FIFO with a single consumer awaiting the next item. */
export class Mailbox<T> {
  private readonly items: T[] = [];
  private waiter: ((item: T) => void) | null = null;

  push(item: T): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(item);
      return;
    }
    this.items.push(item);
  }

  take(): Promise<T> {
    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve(item);
    return new Promise<T>((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Removes and returns everything still queued. */
  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }
}
