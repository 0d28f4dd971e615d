/**
 * Express application factory
 *
 * Builds the HTTP app without binding a port, so tests can drive it with
 * supertest and server.ts can attach Socket.IO to it.
 *
 * @module app
 */

import express, { type Express, type Request, type Response, type NextFunction, type RequestHandler } from 'express';
import cors from 'cors';
import { ErrorCode } from '@blob-relay/shared';
import type { AdminRegistry } from '@/domains/admins';
import { getTransferCoordinator, type TransferCoordinator } from '@/domains/transfers';
import { env, isProd } from '@/infrastructure/config';
import { httpLogger } from '@/middleware/logging';
import { createAdminRoutes } from '@/routes/admin';
import { createTransferRoutes } from '@/routes/transfers';
import { sendError, sendInternalError, sendNotFound } from '@/shared/utils/error-response';

export interface AppDependencies {
  coordinator?: TransferCoordinator;
  admins?: AdminRegistry;
  /** Replaces the multer upload middleware (tests) */
  upload?: RequestHandler;
}

export function parseCorsOrigin(value: string): string | string[] {
  return value.includes(',') ? value.split(',').map((origin) => origin.trim()) : value;
}

export function createApp(deps: AppDependencies = {}): Express {
  const app = express();
  const coordinator = (): TransferCoordinator => deps.coordinator ?? getTransferCoordinator();

  // ===== Middleware =====

  app.use(cors({ origin: parseCorsOrigin(env.CORS_ORIGIN), credentials: true }));
  app.use(httpLogger);
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // ===== Routes =====

  app.get('/health', (_req: Request, res: Response) => {
    const status = coordinator().getStatus();
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      relay: { paused: status.paused, queued: status.queued, busy: status.active !== null },
    });
  });

  app.use('/api/transfers', createTransferRoutes(deps));
  app.use('/api/admin', createAdminRoutes(deps));

  app.use((_req: Request, res: Response) => {
    sendNotFound(res);
  });

  // ===== Error handling =====

  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    req.log.error({ err }, 'Unhandled error');

    if (isProd) {
      sendInternalError(res);
    } else {
      sendError(res, ErrorCode.INTERNAL_ERROR, err.message, { stack: err.stack || 'No stack trace' });
    }
  });

  return app;
}
