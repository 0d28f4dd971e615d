/**
 * TransferJob
 *
 * One submitted transfer and its lifecycle state machine:
 *
 * ```
 * queued ──▶ downloading ──▶ uploading ──▶ completed
 *   │            │               ├───────▶ failed
 *   │            ├──▶ failed     └───────▶ cancelled
 *   │            └──▶ cancelled
 *   └──▶ cancelled
 * ```
 *
 * Terminal jobs are frozen: any further transition throws.
 *
 * @module domains/transfers/TransferJob
 */

import { v4 as uuidv4 } from 'uuid';
import { isTerminalTransferStatus } from '@blob-relay/shared';
import type {
  TransferJobError,
  TransferJobSnapshot,
  TransferJobStatus,
} from '@blob-relay/shared';
import { InvalidTransitionError } from './errors';
import type { TransferPayload } from './payloads';

const ALLOWED_TRANSITIONS: Record<TransferJobStatus, readonly TransferJobStatus[]> = {
  queued: ['downloading', 'cancelled'],
  downloading: ['uploading', 'failed', 'cancelled'],
  uploading: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function canTransition(from: TransferJobStatus, to: TransferJobStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export interface TransferJobInit {
  payload: TransferPayload;
  requesterId: string;
  statusHandle: string;
  /** Defaults to a fresh uppercase UUID */
  id?: string;
  now?: Date;
}

/**
 * Extra fields recorded with a transition
 */
export interface TransitionDetails {
  destinationId?: string;
  error?: TransferJobError;
}

export class TransferJob {
  readonly id: string;
  readonly payload: TransferPayload;
  readonly requesterId: string;
  readonly statusHandle: string;
  readonly submittedAt: Date;

  private _status: TransferJobStatus = 'queued';
  private _startedAt: Date | null = null;
  private _finishedAt: Date | null = null;
  private _destinationId: string | null = null;
  private _error: TransferJobError | null = null;

  /** Last queue position published to the status handle */
  lastAnnouncedPosition: number | null = null;

  constructor(init: TransferJobInit) {
    this.id = init.id ?? uuidv4().toUpperCase();
    this.payload = init.payload;
    this.requesterId = init.requesterId;
    this.statusHandle = init.statusHandle;
    this.submittedAt = init.now ?? new Date();
  }

  get status(): TransferJobStatus {
    return this._status;
  }

  get fileName(): string {
    return this.payload.name;
  }

  get isTerminal(): boolean {
    return isTerminalTransferStatus(this._status);
  }

  get destinationId(): string | null {
    return this._destinationId;
  }

  get error(): TransferJobError | null {
    return this._error;
  }

  /**
   * Move to the next lifecycle state
   *
   * @throws InvalidTransitionError when the state machine forbids the move
   */
  transition(to: TransferJobStatus, details: TransitionDetails = {}, now: Date = new Date()): void {
    if (!canTransition(this._status, to)) {
      throw new InvalidTransitionError(this.id, this._status, to);
    }

    this._status = to;

    if (to === 'downloading') {
      this._startedAt = now;
    }
    if (isTerminalTransferStatus(to)) {
      this._finishedAt = now;
      this._destinationId = details.destinationId ?? null;
      this._error = details.error ?? null;
    }
  }

  toSnapshot(position: number | null = null): TransferJobSnapshot {
    return {
      jobId: this.id,
      fileName: this.payload.name,
      contentType: this.payload.contentType,
      size: this.payload.size,
      requesterId: this.requesterId,
      statusHandle: this.statusHandle,
      status: this._status,
      position: this._status === 'queued' ? position : null,
      submittedAt: this.submittedAt.toISOString(),
      startedAt: this._startedAt?.toISOString() ?? null,
      finishedAt: this._finishedAt?.toISOString() ?? null,
      destinationId: this._destinationId,
      error: this._error,
    };
  }
}
