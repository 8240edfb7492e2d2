/**
 * Cancellable subscription over a callback-based change source.
 *
 * Values can be consumed with `for await` or a listener. `unsubscribe()`
 * releases the underlying source exactly once; iteration then ends after
 * the values already delivered.
 */

import type { EventListener, Unsubscribe } from "./event-hub";

export class ChangeFeed<T> implements AsyncIterable<T> {
  private buffer: Array<{ value: T }> = [];
  private waiters: Array<{
    resolve: (result: IteratorResult<T>) => void;
    reject: (error: Error) => void;
  }> = [];
  private listeners = new Set<EventListener<T>>();
  private failure: Error | null = null;
  private done = false;
  private release: Unsubscribe | null = null;

  /** Attach the source's own unsubscribe; called on `unsubscribe()`. */
  bind(release: Unsubscribe): void {
    if (this.done) {
      release();
      return;
    }
    this.release = release;
  }

  get closed(): boolean {
    return this.done;
  }

  push(value: T): void {
    if (this.done) return;
    this.listeners.forEach((fn) => this.deliver(fn, value));
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value, done: false });
    } else if (this.listeners.size === 0) {
      this.buffer.push({ value });
    }
  }

  /** End the feed with an error from the source. */
  fail(error: Error): void {
    if (this.done) return;
    this.failure = error;
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w.reject(error);
    this.unsubscribe();
  }

  /** Values buffered before the first listener are replayed to it. */
  listen(listener: EventListener<T>): Unsubscribe {
    this.listeners.add(listener);
    const pending = this.buffer;
    this.buffer = [];
    for (const item of pending) this.deliver(listener, item.value);
    return () => {
      this.listeners.delete(listener);
    };
  }

  unsubscribe(): void {
    if (this.done) return;
    this.done = true;
    const release = this.release;
    this.release = null;
    if (release) release();
    this.listeners.clear();
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.unsubscribe();
        return { value: undefined, done: true };
      },
    };
  }

  private deliver(listener: EventListener<T>, value: T): void {
    try {
      listener(value);
    } catch (e) {
      console.error("[Feed] Listener error:", e);
    }
  }

  private next(): Promise<IteratorResult<T>> {
    const item = this.buffer.shift();
    if (item) return Promise.resolve({ value: item.value, done: false });
    if (this.failure) return Promise.reject(this.failure);
    if (this.done) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }
}
