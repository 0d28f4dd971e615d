/**
 * Admin Routes
 *
 * Operator controls for the relay. Every endpoint requires an admin caller.
 *
 * Endpoints:
 * - POST   /api/admin/pause           - Pause the relay and cancel all transfers
 * - POST   /api/admin/resume          - Accept submissions again
 * - GET    /api/admin/admins          - List permanent and dynamic admins
 * - POST   /api/admin/admins          - Add a dynamic admin ({ handle })
 * - DELETE /api/admin/admins/:handle  - Remove a dynamic admin
 */

import { Router, type Request, type Response } from 'express';
import { ErrorCode, adminHandleBodySchema, formatFirstIssue, userHandleSchema } from '@blob-relay/shared';
import { getAdminRegistry, type AdminChangeResult, type AdminRegistry } from '@/domains/admins';
import { getTransferCoordinator, type TransferCoordinator } from '@/domains/transfers';
import { requireAdmin } from '@/middleware/admin-auth';
import { sendError, sendInternalError } from '@/shared/utils/error-response';
import { createChildLogger } from '@/shared/utils/logger';

const logger = createChildLogger({ service: 'AdminRoutes' });

export interface AdminRoutesDependencies {
  coordinator?: TransferCoordinator;
  admins?: AdminRegistry;
}

const FAILURE_CODES: Record<NonNullable<AdminChangeResult['reason']>, ErrorCode> = {
  invalid: ErrorCode.VALIDATION_ERROR,
  permanent: ErrorCode.ADMIN_PERMANENT,
  exists: ErrorCode.ADMIN_ALREADY_EXISTS,
  absent: ErrorCode.ADMIN_NOT_FOUND,
};

function sendChangeResult(res: Response, result: AdminChangeResult, successStatus: number): void {
  if (result.success) {
    res.status(successStatus).json(result);
    return;
  }
  sendError(res, FAILURE_CODES[result.reason ?? 'invalid'], result.message);
}

export function createAdminRoutes(deps: AdminRoutesDependencies = {}): Router {
  const router = Router();
  const coordinator = (): TransferCoordinator => deps.coordinator ?? getTransferCoordinator();
  const admins = deps.admins ?? getAdminRegistry();

  router.use(requireAdmin(admins));

  // ============================================
  // Relay controls
  // ============================================

  router.post('/pause', (req: Request, res: Response) => {
    const result = coordinator().pause();
    logger.info({ by: req.userHandle, ...result }, 'Relay paused by admin');
    res.json(result);
  });

  router.post('/resume', (req: Request, res: Response) => {
    const result = coordinator().resume();
    logger.info({ by: req.userHandle, ...result }, 'Relay resume requested');
    res.json(result);
  });

  // ============================================
  // Admin list
  // ============================================

  router.get('/admins', async (_req: Request, res: Response): Promise<void> => {
    try {
      res.json(await admins.listAdmins());
    } catch (error) {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Failed to list admins');
      sendInternalError(res);
    }
  });

  router.post('/admins', async (req: Request, res: Response): Promise<void> => {
    const body = adminHandleBodySchema.safeParse(req.body);
    if (!body.success) {
      sendError(res, ErrorCode.VALIDATION_ERROR, formatFirstIssue(body.error));
      return;
    }

    try {
      sendChangeResult(res, await admins.addAdmin(body.data.handle), 201);
    } catch (error) {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Failed to add admin');
      sendInternalError(res);
    }
  });

  router.delete('/admins/:handle', async (req: Request, res: Response): Promise<void> => {
    const handle = userHandleSchema.safeParse(req.params.handle);
    if (!handle.success) {
      sendError(res, ErrorCode.VALIDATION_ERROR, formatFirstIssue(handle.error));
      return;
    }

    try {
      sendChangeResult(res, await admins.removeAdmin(handle.data), 200);
    } catch (error) {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Failed to remove admin');
      sendInternalError(res);
    }
  });

  return router;
}
