/**
 * Transfer Constants
 *
 * Defaults for the transfer pipeline and the Socket.IO channel names
 * used for status updates.
 *
 * Usage:
 * ```typescript
 * import { TRANSFER_WS_CHANNELS, getStatusRoom } from '@blob-relay/shared';
 *
 * io.to(getStatusRoom(statusHandle)).emit(TRANSFER_WS_CHANNELS.STATUS, event);
 * ```
 *
 * @module @blob-relay/shared/constants/transfer
 */

export const TRANSFER_CONFIG = {
  /** Minimum spacing between two progress updates for one status handle */
  PROGRESS_INTERVAL_MS: 2000,
  /** Block size used for staged uploads */
  BLOCK_SIZE_BYTES: 4 * 1024 * 1024,
  /** Terminal jobs kept for status lookups */
  HISTORY_LIMIT: 200,
  /** Width of the text progress bar */
  PROGRESS_BAR_WIDTH: 10,
  /** Content type used when the uploader sends none */
  DEFAULT_CONTENT_TYPE: 'application/octet-stream',
} as const;

/**
 * Socket.IO event names (server → client)
 */
export const TRANSFER_WS_CHANNELS = {
  /** Every status text for a handle: queue position, progress, terminal result */
  STATUS: 'transfer:status',
} as const;

export type TransferWsChannel = (typeof TRANSFER_WS_CHANNELS)[keyof typeof TRANSFER_WS_CHANNELS];

/**
 * Socket.IO event names (client → server)
 */
export const TRANSFER_WS_EVENTS = {
  SUBSCRIBE: 'transfer:subscribe',
  UNSUBSCRIBE: 'transfer:unsubscribe',
} as const;

export type TransferWsEvent = (typeof TRANSFER_WS_EVENTS)[keyof typeof TRANSFER_WS_EVENTS];

/** Room prefix for status handles */
export const STATUS_ROOM_PREFIX = 'status:';

export function getStatusRoom(statusHandle: string): string {
  return `${STATUS_ROOM_PREFIX}${statusHandle}`;
}
