/**
 * Constants Index
 *
 * Barrel export for all shared constants.
 *
 * @module @blob-relay/shared/constants
 */

export {
  ErrorCode,
  HTTP_STATUS_NAMES,
  ERROR_MESSAGES,
  ERROR_STATUS_CODES,
  getHttpStatusName,
  getErrorMessage,
  getErrorStatusCode,
  validateErrorConstants,
} from './errors';

export {
  TRANSFER_CONFIG,
  TRANSFER_WS_CHANNELS,
  TRANSFER_WS_EVENTS,
  STATUS_ROOM_PREFIX,
  getStatusRoom,
} from './transfer.constants';
export type { TransferWsChannel, TransferWsEvent } from './transfer.constants';
