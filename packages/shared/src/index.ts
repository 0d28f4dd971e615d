/**
 * @blob-relay/shared
 *
 * Types, constants, schemas and utilities shared by the relay backend
 * and its clients.
 *
 * @module @blob-relay/shared
 *
 * @example
 * ```typescript
 * import type { TransferStatusEvent } from '@blob-relay/shared';
 * import { ErrorCode, TRANSFER_WS_CHANNELS } from '@blob-relay/shared';
 * ```
 */

export * from './types';
export * from './constants';
export * from './schemas';
export * from './utils';
