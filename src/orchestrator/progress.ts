/**
 * Progress side channel.
 *
 * Bounded buffer of progress events between a running turn and the
 * presentation layer. publish() never blocks; on overflow the oldest
 * event is dropped.
 */

import type { ProgressEvent } from './types.js';

export const DEFAULT_PROGRESS_CAPACITY = 256;

export class ProgressChannel implements AsyncIterable<ProgressEvent> {
  private readonly buffer: ProgressEvent[] = [];
  private waiter: (() => void) | null = null;
  private closed = false;
  private droppedCount = 0;

  constructor(private readonly capacity: number = DEFAULT_PROGRESS_CAPACITY) {
    if (capacity < 1) {
      throw new RangeError(`Progress capacity must be >= 1, got ${capacity}`);
    }
  }

  publish(event: ProgressEvent): void {
    if (this.closed) return;

    if (this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this.droppedCount++;
    }
    this.buffer.push(event);
    this.wake();
  }

  /** No further events; pending consumers finish after draining. */
  close(): void {
    this.closed = true;
    this.wake();
  }

  /** Take every buffered event. */
  drain(): ProgressEvent[] {
    return this.buffer.splice(0, this.buffer.length);
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<ProgressEvent> {
    while (true) {
      const next = this.buffer.shift();
      if (next) {
        yield next;
        continue;
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
