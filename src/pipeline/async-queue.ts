/**
 * Single-consumer FIFO that bridges push-style producers (candidate streams, child-process pipes) into
 * an async iterable. `end(err)` makes the iterator throw after the queued items are drained.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<() => void> = [];
  private ended = false;
  private endError: Error | null = null;

  get isEnded(): boolean {
    return this.ended;
  }

  push(item: T): void {
    if (this.ended) return;
    this.items.push(item);
    this.wake();
  }

  end(err?: Error): void {
    if (this.ended) return;
    this.ended = true;
    this.endError = err ?? null;
    this.wake();
  }

  async *iterate(): AsyncGenerator<T, void, undefined> {
    while (true) {
      const next = this.items.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (this.ended) {
        if (this.endError) throw this.endError;
        return;
      }
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  private wake(): void {
    for (const w of this.waiters.splice(0)) w();
  }
}
