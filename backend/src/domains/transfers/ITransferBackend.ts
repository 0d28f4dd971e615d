/**
 * ITransferBackend Interface
 *
 * Contract between the worker and whatever moves the bytes. The backend
 * reports progress by pushing fractions into a sink and checks the
 * cancellation predicate between chunks; it never notifies users itself.
 *
 * @module domains/transfers/ITransferBackend
 */

import type { TransferError } from './errors';

export interface TransferRequest {
  jobId: string;
  requesterId: string;
  /** Original file name; the backend derives the destination path from it */
  fileName: string;
  contentType: string;
  data: Buffer;
}

/**
 * Write end of the progress channel
 */
export interface ProgressSink {
  /** Fraction in [0, 1] */
  push(fraction: number): void;
}

export interface TransferContext {
  progress: ProgressSink;
  /** Polled between chunks */
  isCancelled(): boolean;
  /** Aborts an in-flight chunk request */
  signal: AbortSignal;
}

export type TransferOutcome =
  | { kind: 'completed'; destinationId: string }
  | { kind: 'cancelled' }
  | { kind: 'failed'; error: TransferError };

export interface ITransferBackend {
  transfer(request: TransferRequest, context: TransferContext): Promise<TransferOutcome>;
}
