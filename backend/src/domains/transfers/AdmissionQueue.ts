/**
 * AdmissionQueue
 *
 * FIFO of jobs waiting for the worker. Insertion order is processing order.
 * Only the worker dequeues; only the pause controller drains.
 *
 * @module domains/transfers/AdmissionQueue
 */

import type { TransferJob } from './TransferJob';

export class AdmissionQueue {
  private items: TransferJob[] = [];

  enqueue(job: TransferJob): number {
    this.items.push(job);
    return this.items.length;
  }

  dequeue(): TransferJob | undefined {
    return this.items.shift();
  }

  /**
   * Remove and return every queued job, oldest first
   */
  dequeueAll(): TransferJob[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /**
   * 1-based position of a queued job, null when it is not queued
   */
  positionOf(jobId: string): number | null {
    const index = this.items.findIndex((job) => job.id === jobId);
    return index === -1 ? null : index + 1;
  }

  snapshot(): readonly TransferJob[] {
    return [...this.items];
  }
}
