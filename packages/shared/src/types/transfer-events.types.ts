/**
 * Transfer Status Event Types
 *
 * Payload of the `transfer:status` WebSocket event. Each event carries the
 * full status text to render for a status handle; `sequence` only grows,
 * across all handles, so clients can drop stale renders.
 *
 * @module @blob-relay/shared/types/transfer-events
 */

import type { TransferJobStatus } from './transfer.types';

export type TransferStatusEventKind = 'status' | 'position' | 'progress';

export interface TransferStatusEvent {
  jobId: string;
  statusHandle: string;
  status: TransferJobStatus;
  kind: TransferStatusEventKind;
  /** Text to render in place of the previous status text */
  text: string;
  /** Present on 'position' events */
  position?: number;
  /** 0..1, present on 'progress' events */
  progress?: number;
  /** Relay-wide counter starting at 1; increasing within every handle */
  sequence: number;
  emittedAt: string;
}

/**
 * Client → server subscription payload
 */
export interface TransferSubscriptionData {
  statusHandle: string;
}
