/**
 * Upload Middleware
 *
 * Multer configuration for transfer submissions. The single `file` field is
 * spooled to UPLOAD_TMP_DIR; the transfer job owns the temp file from then
 * on and removes it when it finishes.
 *
 * @module middleware/upload
 */

import path from 'path';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import multer, { MulterError } from 'multer';
import { v4 as uuidv4 } from 'uuid';
import { ErrorCode } from '@blob-relay/shared';
import { env } from '@/infrastructure/config';
import { sendError } from '@/shared/utils/error-response';

export const UPLOAD_FIELD = 'file';

export interface UploadOptions {
  tmpDir?: string;
  maxBytes?: number;
}

/**
 * Single-file upload with multer errors mapped to API errors
 * (413 for the size limit, 400 for anything else multer rejects)
 */
export function createUploadMiddleware(options: UploadOptions = {}): RequestHandler {
  const maxBytes = options.maxBytes ?? env.UPLOAD_MAX_BYTES;

  const upload = multer({
    storage: multer.diskStorage({
      destination: options.tmpDir ?? env.UPLOAD_TMP_DIR,
      filename: (_req, file, cb) => {
        cb(null, `${uuidv4()}${path.extname(file.originalname)}`);
      },
    }),
    limits: {
      fileSize: maxBytes,
      files: 1,
    },
  });

  return (req: Request, res: Response, next: NextFunction) => {
    upload.single(UPLOAD_FIELD)(req, res, (err: unknown) => {
      if (err instanceof MulterError) {
        switch (err.code) {
          case 'LIMIT_FILE_SIZE':
            sendError(
              res,
              ErrorCode.PAYLOAD_TOO_LARGE,
              `File size exceeds ${Math.floor(maxBytes / (1024 * 1024))}MB limit`
            );
            return;
          case 'LIMIT_FILE_COUNT':
          case 'LIMIT_UNEXPECTED_FILE':
            sendError(res, ErrorCode.VALIDATION_ERROR, `Send exactly one file in the "${UPLOAD_FIELD}" field`);
            return;
          default:
            sendError(res, ErrorCode.VALIDATION_ERROR, err.message);
            return;
        }
      }
      if (err) {
        next(err);
        return;
      }
      next();
    });
  };
}
