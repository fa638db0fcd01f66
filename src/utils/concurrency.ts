/**
 * Single-consumer async queue. Producers push without waiting; the one
 * consumer iterates with `for await` until the channel is closed.
 */
export class ResultChannel<T> implements AsyncIterable<T> {
  private queue: T[] = [];
  private waiting: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;

  push(value: T): void {
    if (this.closed) return;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value, done: false });
    } else {
      this.queue.push(value);
    }
  }

  /** Stop accepting values. Already queued values are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.queue.length > 0) {
      const [value] = this.queue.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    if (this.waiting) throw new Error('ResultChannel supports a single consumer');
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}

/**
 * Run `task` over every item of `source` with at most `concurrency` in
 * flight, handing each result to `sink` as it completes. Items are pulled
 * in source order; completions arrive in any order. Once `signal` aborts no
 * further items are started and late results are dropped.
 */
export async function runPool<T, R>(
  source: Iterable<T>,
  concurrency: number,
  task: (item: T) => Promise<R>,
  sink: (result: R) => void,
  signal?: AbortSignal
): Promise<void> {
  const iterator = source[Symbol.iterator]();

  async function worker(): Promise<void> {
    while (!signal?.aborted) {
      const next = iterator.next();
      if (next.done) return;
      const result = await task(next.value);
      if (signal?.aborted) return;
      sink(result);
    }
  }

  const width = Number.isFinite(concurrency) ? Math.max(1, Math.floor(concurrency)) : 1;
  await Promise.all(Array.from({ length: width }, () => worker()));
}
