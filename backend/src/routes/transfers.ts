/**
 * Transfer Routes
 *
 * POST /api/transfers         submit a file (admins only)
 * GET  /api/transfers         relay status
 * GET  /api/transfers/:jobId  job snapshot
 *
 * @module routes/transfers
 */

import { promises as fs } from 'fs';
import { Router, type Request, type Response, type NextFunction, type RequestHandler } from 'express';
import {
  ErrorCode,
  TRANSFER_CONFIG,
  defaultStatusHandle,
  formatFirstIssue,
  submitTransferBodySchema,
  transferIdParamsSchema,
  validateFileName,
} from '@blob-relay/shared';
import type { SubmitTransferResult } from '@blob-relay/shared';
import { getAdminRegistry, type AdminRegistry } from '@/domains/admins';
import { createFilePayload, getTransferCoordinator, type TransferCoordinator } from '@/domains/transfers';
import { PAUSED_SUBMISSION_MESSAGE } from '@/domains/transfers/status-messages';
import { requireAdmin, requireUser } from '@/middleware/admin-auth';
import { createUploadMiddleware } from '@/middleware/upload';
import { sendError, sendInternalError } from '@/shared/utils/error-response';
import { createChildLogger } from '@/shared/utils/logger';

const logger = createChildLogger({ service: 'TransferRoutes' });

export interface TransferRoutesDependencies {
  coordinator?: TransferCoordinator;
  admins?: AdminRegistry;
  upload?: RequestHandler;
}

/**
 * Multer decodes multipart file names as latin1; recover UTF-8 names
 */
export function decodeOriginalName(name: string): string {
  const decoded = Buffer.from(name, 'latin1').toString('utf8');
  return decoded.includes('�') ? name : decoded;
}

async function discardUpload(file: Express.Multer.File): Promise<void> {
  try {
    await fs.rm(file.path, { force: true });
  } catch (error) {
    logger.warn({ path: file.path, error: error instanceof Error ? error.message : String(error) }, 'Failed to remove rejected upload');
  }
}

export function createTransferRoutes(deps: TransferRoutesDependencies = {}): Router {
  const router = Router();
  const coordinator = (): TransferCoordinator => deps.coordinator ?? getTransferCoordinator();
  const admins = deps.admins ?? getAdminRegistry();

  // Answer before multer spools the body to disk
  const rejectWhenPaused = (_req: Request, res: Response, next: NextFunction): void => {
    if (coordinator().isPaused()) {
      sendError(res, ErrorCode.TRANSFERS_PAUSED, PAUSED_SUBMISSION_MESSAGE);
      return;
    }
    next();
  };

  /**
   * POST /api/transfers
   * Multipart: `file` (required), `statusHandle` (optional)
   */
  router.post(
    '/',
    requireAdmin(admins),
    rejectWhenPaused,
    deps.upload ?? createUploadMiddleware(),
    async (req: Request, res: Response): Promise<void> => {
      const file = req.file;
      if (!file) {
        sendError(res, ErrorCode.MISSING_FILE);
        return;
      }

      const validation = submitTransferBodySchema.safeParse(req.body);
      if (!validation.success) {
        await discardUpload(file);
        sendError(res, ErrorCode.VALIDATION_ERROR, formatFirstIssue(validation.error));
        return;
      }

      const fileName = decodeOriginalName(file.originalname);
      const nameCheck = validateFileName(fileName);
      if (!nameCheck.isValid) {
        await discardUpload(file);
        sendError(res, ErrorCode.INVALID_FILE_NAME, nameCheck.reason);
        return;
      }

      const requesterId = req.userHandle ?? '';
      const statusHandle = validation.data.statusHandle ?? defaultStatusHandle(requesterId);

      let result: SubmitTransferResult;
      try {
        result = coordinator().submit({
          payload: createFilePayload({
            name: fileName,
            contentType: file.mimetype || TRANSFER_CONFIG.DEFAULT_CONTENT_TYPE,
            path: file.path,
            size: file.size,
          }),
          requesterId,
          statusHandle,
        });
      } catch (error) {
        logger.error({ error: error instanceof Error ? error.message : String(error), fileName }, 'Submission failed');
        await discardUpload(file);
        sendInternalError(res);
        return;
      }

      if (!result.accepted) {
        await discardUpload(file);
        sendError(res, ErrorCode.TRANSFERS_PAUSED, result.message);
        return;
      }

      logger.info({ jobId: result.jobId, requesterId, statusHandle }, 'Transfer submitted');
      res.status(202).json({ jobId: result.jobId, position: result.position, statusHandle });
    }
  );

  /**
   * GET /api/transfers
   */
  router.get('/', requireUser, (_req: Request, res: Response) => {
    res.json(coordinator().getStatus());
  });

  /**
   * GET /api/transfers/:jobId
   */
  router.get('/:jobId', requireUser, (req: Request, res: Response) => {
    const params = transferIdParamsSchema.safeParse(req.params);
    if (!params.success) {
      sendError(res, ErrorCode.VALIDATION_ERROR, formatFirstIssue(params.error));
      return;
    }

    const snapshot = coordinator().getJob(params.data.jobId);
    if (!snapshot) {
      sendError(res, ErrorCode.TRANSFER_NOT_FOUND);
      return;
    }
    res.json(snapshot);
  });

  return router;
}
