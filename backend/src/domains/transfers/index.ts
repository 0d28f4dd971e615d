/**
 * Transfers Domain
 *
 * @module domains/transfers
 */

export { TransferCoordinator, getTransferCoordinator, __resetTransferCoordinator } from './TransferCoordinator';
export type { TransferCoordinatorDependencies, SubmitTransferInput } from './TransferCoordinator';
export { TransferJob, canTransition } from './TransferJob';
export { AdmissionQueue } from './AdmissionQueue';
export { PauseState } from './PauseState';
export { PauseController } from './PauseController';
export { TransferWorker } from './TransferWorker';
export { ExecutionSlot } from './ExecutionSlot';
export { ProgressThrottler } from './ProgressThrottler';
export { ProgressChannel } from './ProgressChannel';
export { StatusNotifier } from './StatusNotifier';
export type { IStatusChannel, StatusUpdate } from './StatusNotifier';
export { QueuePositionReporter } from './QueuePositionReporter';
export { TransferJobRegistry } from './TransferJobRegistry';
export { createBufferPayload, createFilePayload, disposePayload } from './payloads';
export type { TransferPayload } from './payloads';
export type {
  ITransferBackend,
  TransferRequest,
  TransferContext,
  TransferOutcome,
  ProgressSink,
} from './ITransferBackend';
export {
  TransferAuthError,
  TransferFailure,
  InvalidTransitionError,
  toTransferError,
} from './errors';
export type { TransferError } from './errors';
