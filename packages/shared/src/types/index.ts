/**
 * Types Index
 *
 * Barrel export for all shared type definitions.
 *
 * @module @blob-relay/shared/types
 */

// Transfer types
export type {
  TransferJobStatus,
  TransferJobError,
  TransferErrorKind,
  TransferJobSnapshot,
  SubmitTransferResult,
  PauseResult,
  ResumeResult,
  RelayStatus,
} from './transfer.types';
export {
  TERMINAL_TRANSFER_STATUSES,
  ACTIVE_TRANSFER_STATUSES,
  isTerminalTransferStatus,
  isActiveTransferStatus,
} from './transfer.types';

// Transfer status events
export type {
  TransferStatusEvent,
  TransferStatusEventKind,
  TransferSubscriptionData,
} from './transfer-events.types';

// Error types
export type {
  ApiErrorResponse,
  ErrorResponseWithStatus,
  ValidationErrorDetail,
} from './error.types';
export { isApiErrorResponse, isValidErrorCode } from './error.types';
