/**
 * Transfer Types
 *
 * Public shape of transfer jobs and the results of the submit/pause/resume
 * operations. Shared by the backend and any client rendering status.
 *
 * @module @blob-relay/shared/types/transfer
 */

/**
 * Lifecycle of a transfer job
 *
 * queued → downloading → uploading → completed | failed | cancelled
 */
export type TransferJobStatus =
  | 'queued'
  | 'downloading'
  | 'uploading'
  | 'completed'
  | 'failed'
  | 'cancelled';

export const TERMINAL_TRANSFER_STATUSES: readonly TransferJobStatus[] = [
  'completed',
  'failed',
  'cancelled',
] as const;

export const ACTIVE_TRANSFER_STATUSES: readonly TransferJobStatus[] = [
  'downloading',
  'uploading',
] as const;

export function isTerminalTransferStatus(status: TransferJobStatus): boolean {
  return TERMINAL_TRANSFER_STATUSES.includes(status);
}

export function isActiveTransferStatus(status: TransferJobStatus): boolean {
  return ACTIVE_TRANSFER_STATUSES.includes(status);
}

/**
 * Error recorded on a failed or cancelled job
 */
export interface TransferJobError {
  /** 'auth' | 'transfer' | 'download' | 'cancelled' | 'internal' */
  code: TransferErrorKind;
  message: string;
}

export type TransferErrorKind = 'auth' | 'transfer' | 'download' | 'cancelled' | 'internal';

/**
 * Serializable view of a transfer job
 */
export interface TransferJobSnapshot {
  jobId: string;
  fileName: string;
  contentType: string;
  size: number | null;
  requesterId: string;
  statusHandle: string;
  status: TransferJobStatus;
  /** 1-based queue position, null once the job left the queue */
  position: number | null;
  submittedAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  destinationId: string | null;
  error: TransferJobError | null;
}

/**
 * Result of a submission
 */
export type SubmitTransferResult =
  | {
      accepted: true;
      jobId: string;
      /** Queue position at admission; 0 when the worker picked it up immediately */
      position: number;
    }
  | {
      accepted: false;
      reason: 'paused';
      message: string;
    };

/**
 * Result of an operator pause
 */
export interface PauseResult {
  /** Queued jobs cancelled by the drain (the active job is not counted) */
  drainedCount: number;
  /** Whether a running job was signalled to stop */
  activeJobCancelled: boolean;
}

export interface ResumeResult {
  /** False when the relay was not paused */
  resumed: boolean;
}

/**
 * Relay-wide status for dashboards
 */
export interface RelayStatus {
  paused: boolean;
  queued: number;
  active: TransferJobSnapshot | null;
}
