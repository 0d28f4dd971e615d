/**
 * ExecutionSlot
 *
 * Capacity-1 token for the worker loop. Whoever holds the lease is the only
 * activation allowed to run jobs; the lease carries the abort signal the
 * pause controller uses to stop the running transfer.
 *
 * @module domains/transfers/ExecutionSlot
 */

export interface ExecutionLease {
  readonly signal: AbortSignal;
  isCancelled(): boolean;
  release(): void;
}

export class ExecutionSlot {
  private current: { controller: AbortController; lease: ExecutionLease } | null = null;

  /**
   * Take the slot, or null when another activation holds it
   */
  tryAcquire(): ExecutionLease | null {
    if (this.current) {
      return null;
    }

    const controller = new AbortController();
    const lease: ExecutionLease = {
      signal: controller.signal,
      isCancelled: () => controller.signal.aborted,
      release: () => {
        if (this.current?.lease === lease) {
          this.current = null;
        }
      },
    };

    this.current = { controller, lease };
    return lease;
  }

  /**
   * Abort the current lease. Returns false when the slot is free or already aborted.
   */
  cancelCurrent(reason?: string): boolean {
    if (!this.current || this.current.controller.signal.aborted) {
      return false;
    }
    this.current.controller.abort(reason);
    return true;
  }

  isBusy(): boolean {
    return this.current !== null;
  }
}
