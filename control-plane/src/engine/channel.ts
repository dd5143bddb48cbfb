/** Unbounded single-consumer queue; `receive` suspends until a value arrives. */
export class Channel<T extends object> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<(value: T) => void> = [];

  send(value: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(value);
      return;
    }
    this.buffer.push(value);
  }

  receive(): Promise<T> {
    const next = this.buffer.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    return new Promise<T>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  get size(): number {
    return this.buffer.length;
  }
}
