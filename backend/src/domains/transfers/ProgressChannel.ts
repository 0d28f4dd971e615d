/**
 * ProgressChannel
 *
 * Single-producer, single-consumer channel carrying progress fractions from
 * a transfer backend to the worker. The backend pushes; the worker iterates
 * with `for await` until the channel is closed and drained.
 *
 * @module domains/transfers/ProgressChannel
 */

import type { ProgressSink } from './ITransferBackend';

export class ProgressChannel implements ProgressSink, AsyncIterable<number> {
  private buffer: number[] = [];
  private closed = false;
  private wake: (() => void) | null = null;

  push(fraction: number): void {
    if (this.closed) {
      return;
    }
    this.buffer.push(Math.min(1, Math.max(0, fraction)));
    this.signal();
  }

  close(): void {
    this.closed = true;
    this.signal();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<number> {
    while (true) {
      const next = this.buffer.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (this.closed) {
        return;
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
