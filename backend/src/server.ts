/**
 * blob-relay server entry point
 *
 * Startup:
 * 1. Build the storage backend and the transfer coordinator
 * 2. Create the Express app and the HTTP server
 * 3. Attach Socket.IO and the status subscription handlers
 *
 * Shutdown (SIGTERM/SIGINT): pause the relay, wait for the worker and
 * pending status updates, then close Socket.IO and the HTTP server.
 */

import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { createApp, parseCorsOrigin } from '@/app';
import { getAdminRegistry } from '@/domains/admins';
import { getTransferCoordinator } from '@/domains/transfers';
import { describeConfig, env } from '@/infrastructure/config';
import { createBlobTransferBackend } from '@/infrastructure/storage/BlobTransferBackend';
import {
  SocketStatusChannel,
  attachTransferSocketHandlers,
  initSocketService,
} from '@/services/websocket';
import { createChildLogger } from '@/shared/utils/logger';

const logger = createChildLogger({ service: 'Server' });

async function startServer(): Promise<void> {
  const coordinator = getTransferCoordinator({
    backend: createBlobTransferBackend(env),
    channel: new SocketStatusChannel(),
    progressIntervalMs: env.TRANSFER_PROGRESS_INTERVAL_MS,
    historyLimit: env.TRANSFER_HISTORY_LIMIT,
  });
  const admins = getAdminRegistry();

  const app = createApp({ coordinator, admins });
  const httpServer = createServer(app);

  const io = new SocketIOServer(httpServer, {
    cors: {
      origin: parseCorsOrigin(env.CORS_ORIGIN),
      methods: ['GET', 'POST'],
      credentials: true,
    },
    transports: ['websocket', 'polling'],
  });
  initSocketService(io);
  attachTransferSocketHandlers(io, { admins });

  let shuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    try {
      const result = await coordinator.shutdown();
      logger.info(result, 'Relay stopped');

      // Disconnects clients and closes the HTTP server
      await new Promise<void>((resolve) => {
        io.close(() => resolve());
      });

      logger.info('All connections closed, exiting');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during graceful shutdown');
      process.exit(1);
    }
  }

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  await new Promise<void>((resolve) => {
    httpServer.listen(env.PORT, () => resolve());
  });

  logger.info(describeConfig(env), `Server running on port ${env.PORT}`);
}

startServer().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
