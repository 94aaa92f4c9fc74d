/**
 * Unbounded, ordered, single-consumer async queue.
 *
 * A producer pushes values and closes the queue; the consumer iterates with
 * `for await`. Leaving the loop early (break, return, throw) or calling
 * {@link ChunkQueue.cancel} closes the queue and runs the cancel hook once,
 * which the producer uses to stop and release its resources.
 */
export class ChunkQueue<T> implements AsyncIterableIterator<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;
  private cancelledFlag = false;

  constructor(private readonly onCancel?: () => void) {}

  get isClosed(): boolean {
    return this.closed;
  }

  get cancelled(): boolean {
    return this.cancelledFlag;
  }

  /**
   * Enqueue a value. Returns false once the queue is closed.
   */
  push(value: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value });
    } else {
      this.buffer.push(value);
    }
    return true;
  }

  /**
   * End of input. Buffered values are still delivered.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ done: true, value: undefined });
    }
  }

  /**
   * Stop consuming. Drops buffered values and signals the producer.
   */
  cancel(): void {
    if (this.cancelledFlag) {
      return;
    }
    this.cancelledFlag = true;
    this.buffer.length = 0;
    this.close();
    this.onCancel?.();
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ done: false, value });
    }
    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  return(): Promise<IteratorResult<T>> {
    this.cancel();
    return Promise.resolve({ done: true, value: undefined });
  }

  [Symbol.asyncIterator](): this {
    return this;
  }
}
