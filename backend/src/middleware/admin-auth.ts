/**
 * Caller Identity & Admin Authorization
 *
 * The gateway in front of the relay authenticates users and forwards the
 * handle in `X-User-Handle`. These middlewares read it and gate routes on
 * the admin registry.
 *
 * Usage:
 * ```typescript
 * router.post('/pause', requireAdmin(), handler);
 * ```
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { ErrorCode, normalizeUserHandle } from '@blob-relay/shared';
import { getAdminRegistry, type AdminRegistry } from '@/domains/admins';
import { createChildLogger } from '@/shared/utils/logger';
import { sendError, sendForbidden, sendUnauthorized } from '@/shared/utils/error-response';

const logger = createChildLogger({ service: 'AdminAuth' });

export const USER_HANDLE_HEADER = 'x-user-handle';

declare global {
  namespace Express {
    interface Request {
      /** Normalized caller handle, set by requireUser */
      userHandle?: string;
    }
  }
}

/**
 * Normalized handle from the request header, or null when absent
 */
export function getCallerHandle(req: Request): string | null {
  const raw = req.header(USER_HANDLE_HEADER);
  if (!raw) {
    return null;
  }
  const handle = normalizeUserHandle(raw);
  return handle || null;
}

/**
 * Require a caller identity (401 without one)
 */
export function requireUser(req: Request, res: Response, next: NextFunction): void {
  const handle = getCallerHandle(req);
  if (!handle) {
    sendUnauthorized(res);
    return;
  }
  req.userHandle = handle;
  next();
}

/**
 * Require the caller to be an admin (401 without identity, 403 when not an admin)
 */
export function requireAdmin(registry?: AdminRegistry): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const handle = getCallerHandle(req);
    if (!handle) {
      sendUnauthorized(res);
      return;
    }

    const admins = registry ?? getAdminRegistry();
    admins
      .isAdmin(handle)
      .then((isAdmin) => {
        if (!isAdmin) {
          logger.warn({ handle, path: req.path }, 'Non-admin caller rejected');
          sendForbidden(res, ErrorCode.ADMIN_REQUIRED);
          return;
        }
        req.userHandle = handle;
        next();
      })
      .catch((error: unknown) => {
        logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Admin check failed');
        sendError(res, ErrorCode.INTERNAL_ERROR);
      });
  };
}
