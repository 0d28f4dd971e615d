/**
 * SocketService - Singleton holder for the Socket.IO server instance
 *
 * Gives the status channel access to the Socket.IO server created in
 * server.ts without threading it through every constructor.
 *
 * Usage:
 * ```typescript
 * // server.ts
 * initSocketService(io);
 *
 * // elsewhere
 * if (isSocketServiceInitialized()) {
 *   getSocketIO().to(getStatusRoom(handle)).emit(TRANSFER_WS_CHANNELS.STATUS, event);
 * }
 * ```
 *
 * @module services/websocket/SocketService
 */

import type { Server as SocketServer } from 'socket.io';
import { createChildLogger } from '@/shared/utils/logger';

const logger = createChildLogger({ service: 'SocketService' });

let socketIOInstance: SocketServer | null = null;

/**
 * Register the Socket.IO server. A second call is ignored.
 */
export function initSocketService(io: SocketServer): void {
  if (socketIOInstance !== null) {
    logger.warn('SocketService already initialized - skipping re-initialization');
    return;
  }

  socketIOInstance = io;
  logger.info('SocketService initialized');
}

/**
 * @throws Error if SocketService has not been initialized
 */
export function getSocketIO(): SocketServer {
  if (socketIOInstance === null) {
    const error = new Error(
      'SocketService not initialized. Call initSocketService(io) during server startup.'
    );
    logger.error({ err: error }, 'Attempted to access Socket.IO before initialization');
    throw error;
  }

  return socketIOInstance;
}

export function isSocketServiceInitialized(): boolean {
  return socketIOInstance !== null;
}

/**
 * @internal Testing only
 */
export function __resetSocketService(): void {
  socketIOInstance = null;
  logger.debug('SocketService reset (testing only)');
}
