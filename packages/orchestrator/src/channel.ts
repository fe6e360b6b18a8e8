import { ImportlineError } from "@importline/core";

/**
 * Unbounded FIFO channel with a single consumer.
 *
 * Producers push from any task; the consumer drains values strictly in push order
 * with `for await`, and iteration ends once the channel is closed and empty.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiting: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(value: T): void {
    if (this.closed) {
      throw new ImportlineError("Cannot push to a closed channel");
    }

    const resolve = this.waiting;
    if (resolve) {
      this.waiting = null;
      resolve({ done: false, value });
      return;
    }

    this.buffer.push(value);
  }

  close(): void {
    this.closed = true;

    const resolve = this.waiting;
    if (resolve) {
      this.waiting = null;
      resolve({ done: true, value: undefined });
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      if (this.buffer.length > 0) {
        const [value] = this.buffer.splice(0, 1);
        yield value;
        continue;
      }

      if (this.closed) return;

      const next = await new Promise<IteratorResult<T, undefined>>((resolve) => {
        this.waiting = resolve;
      });
      if (next.done) return;
      yield next.value;
    }
  }
}
