/**
 * Transfer Errors
 *
 * Failures that end a job in `failed`. Operator cancellation is not an
 * error: it is the `cancelled` variant of TransferOutcome.
 *
 * @module domains/transfers/errors
 */

import type { TransferErrorKind, TransferJobStatus } from '@blob-relay/shared';

/**
 * The storage backend rejected our credentials
 */
export class TransferAuthError extends Error {
  readonly kind: TransferErrorKind = 'auth';

  constructor(
    message: string,
    readonly remediation: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'TransferAuthError';
  }
}

/**
 * Any other failure while fetching or uploading the payload
 */
export class TransferFailure extends Error {
  constructor(
    message: string,
    readonly kind: Extract<TransferErrorKind, 'transfer' | 'download' | 'internal'> = 'transfer',
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'TransferFailure';
  }
}

export type TransferError = TransferAuthError | TransferFailure;

/**
 * A lifecycle transition the state machine does not allow
 */
export class InvalidTransitionError extends Error {
  constructor(
    readonly jobId: string,
    readonly from: TransferJobStatus,
    readonly to: TransferJobStatus
  ) {
    super(`Invalid transition for job ${jobId}: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap anything thrown into a TransferError, keeping TransferErrors as-is
 */
export function toTransferError(
  error: unknown,
  kind: Extract<TransferErrorKind, 'transfer' | 'download' | 'internal'> = 'transfer'
): TransferError {
  if (error instanceof TransferAuthError || error instanceof TransferFailure) {
    return error;
  }
  return new TransferFailure(errorMessage(error), kind, { cause: error });
}
