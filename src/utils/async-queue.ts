/**
 * Unbounded single-consumer queue exposed as an async iterable.
 *
 * Producers push from event-emitter callbacks; the consumer pulls with
 * `for await`. Items pushed before `end()` or `fail()` are still delivered,
 * after which the iteration finishes (or throws the failure).
 */

import type { Deferred } from "../types.js";
import { createDeferred } from "./deferred.js";

export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiter: Deferred<IteratorResult<T>> | null = null;
  private ended = false;
  private failure: { error: unknown } | null = null;

  push(item: T): void {
    if (this.ended) {
      return;
    }
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.resolve({ value: item, done: false });
      return;
    }
    this.items.push(item);
  }

  /** Finish the sequence once the buffered items are drained. Idempotent. */
  end(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.resolve({ value: undefined, done: true });
    }
  }

  /** Finish the sequence with an error, raised after the buffered items are drained. */
  fail(error: unknown): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.failure = { error };
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.reject(error);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  next(): Promise<IteratorResult<T>> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve({ value: item, done: false });
    }
    if (this.failure) {
      return Promise.reject(this.failure.error);
    }
    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiter) {
      return Promise.reject(new Error("AsyncQueue supports a single consumer"));
    }
    this.waiter = createDeferred<IteratorResult<T>>();
    return this.waiter.promise;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: () => {
        this.end();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
