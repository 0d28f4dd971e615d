/**
 * ProgressThrottler
 *
 * Sampling throttle for progress updates, keyed by status handle. An update
 * passes when nothing was emitted for the key yet, or when at least
 * `intervalMs` elapsed since the last emitted one. Dropped updates are not
 * replayed.
 *
 * @module domains/transfers/ProgressThrottler
 */

import { TRANSFER_CONFIG } from '@blob-relay/shared';

export interface ProgressThrottlerOptions {
  intervalMs?: number;
  /** Clock in milliseconds, injectable for tests */
  now?: () => number;
}

export class ProgressThrottler {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly lastEmitted = new Map<string, number>();

  constructor(options: ProgressThrottlerOptions = {}) {
    this.intervalMs = options.intervalMs ?? TRANSFER_CONFIG.PROGRESS_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Whether an update for `key` may go out now; records the emission when it may
   */
  shouldEmit(key: string, now: number = this.now()): boolean {
    const last = this.lastEmitted.get(key);
    if (last !== undefined && now - last < this.intervalMs) {
      return false;
    }
    this.lastEmitted.set(key, now);
    return true;
  }

  release(key: string): void {
    this.lastEmitted.delete(key);
  }

  get trackedKeys(): number {
    return this.lastEmitted.size;
  }
}
