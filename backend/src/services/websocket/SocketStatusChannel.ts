/**
 * SocketStatusChannel
 *
 * IStatusChannel that emits `transfer:status` to the Socket.IO room of the
 * status handle. When Socket.IO is not initialized the event is dropped
 * with a warning; delivery is best effort either way.
 *
 * @module services/websocket/SocketStatusChannel
 */

import type { Logger } from 'pino';
import type { Server as SocketServer } from 'socket.io';
import { TRANSFER_WS_CHANNELS, getStatusRoom } from '@blob-relay/shared';
import type { TransferStatusEvent } from '@blob-relay/shared';
import type { IStatusChannel } from '@/domains/transfers';
import { createChildLogger } from '@/shared/utils/logger';
import { getSocketIO, isSocketServiceInitialized } from './SocketService';

export interface SocketStatusChannelDependencies {
  logger?: Logger;
  isSocketReady?: () => boolean;
  getIO?: () => SocketServer;
}

export class SocketStatusChannel implements IStatusChannel {
  private readonly log: Logger;
  private readonly isSocketReady: () => boolean;
  private readonly getIO: () => SocketServer;

  constructor(deps?: SocketStatusChannelDependencies) {
    this.log = deps?.logger ?? createChildLogger({ service: 'SocketStatusChannel' });
    this.isSocketReady = deps?.isSocketReady ?? isSocketServiceInitialized;
    this.getIO = deps?.getIO ?? getSocketIO;
  }

  send(statusHandle: string, event: TransferStatusEvent): void {
    if (!this.isSocketReady()) {
      this.log.warn(
        { statusHandle, jobId: event.jobId, kind: event.kind },
        'Skipping status event: Socket.IO not initialized'
      );
      return;
    }

    const room = getStatusRoom(statusHandle);
    this.getIO().to(room).emit(TRANSFER_WS_CHANNELS.STATUS, event);
    this.log.debug({ room, jobId: event.jobId, sequence: event.sequence }, 'Status event emitted');
  }
}
