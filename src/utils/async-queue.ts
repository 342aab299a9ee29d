// This module provides a single-consumer async queue that feeds transport frames into a session loop.

interface PendingPull<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
}

export class AsyncQueue<T> implements AsyncIterableIterator<T> {
  private readonly items: T[] = [];
  private pending: PendingPull<T> | null = null;
  private ended = false;
  private failure: { error: unknown } | null = null;

  public constructor(
    public readonly capacity: number,
    private readonly onSpaceAvailable?: () => void
  ) {}

  public get size(): number {
    return this.items.length;
  }

  public get isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  public get isEnded(): boolean {
    return this.ended;
  }

  /**
   * Enqueues one item. Returns false once the queue is at or above capacity so
   * producers can pause; items are still accepted until `end` or `fail`.
   */
  public push(item: T): boolean {
    if (this.ended) {
      return false;
    }

    if (this.pending) {
      const { resolve } = this.pending;
      this.pending = null;
      resolve({ value: item, done: false });
      return true;
    }

    this.items.push(item);
    return !this.isFull;
  }

  // Buffered items are still delivered; iteration finishes after them.
  public end(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.settlePending();
  }

  // Buffered items are still delivered; the consumer then receives `error`.
  public fail(error: unknown): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.failure = { error };
    this.settlePending();
  }

  public next(): Promise<IteratorResult<T>> {
    if (this.items.length > 0) {
      const wasFull = this.isFull;
      const value = this.items[0];
      this.items.shift();
      if (wasFull && !this.isFull) {
        this.onSpaceAvailable?.();
      }
      return Promise.resolve({ value, done: false });
    }

    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      return Promise.reject(error);
    }

    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  public return(): Promise<IteratorResult<T>> {
    this.items.length = 0;
    this.failure = null;
    this.end();
    return Promise.resolve({ value: undefined, done: true });
  }

  public [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  private settlePending(): void {
    if (!this.pending) {
      return;
    }

    const { resolve, reject } = this.pending;
    this.pending = null;
    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      reject(error);
      return;
    }
    resolve({ value: undefined, done: true });
  }
}
