/**
 * Error Response Utilities Unit Tests
 *
 * @module __tests__/unit/shared/utils/error-response.test
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Response } from 'express';
import { ErrorCode } from '@blob-relay/shared';
import {
  createErrorResponse,
  sendBadRequest,
  sendError,
  sendForbidden,
  sendInternalError,
  sendNotFound,
  sendUnauthorized,
} from '@/shared/utils/error-response';

function createMockResponse(): Response {
  const res = {
    status: vi.fn().mockReturnThis(),
    json: vi.fn().mockReturnThis(),
  };
  return res as unknown as Response;
}

describe('Error Response Utilities', () => {
  let mockRes: Response;

  beforeEach(() => {
    mockRes = createMockResponse();
  });

  describe('createErrorResponse', () => {
    it('builds the body from the code defaults', () => {
      expect(createErrorResponse(ErrorCode.TRANSFERS_PAUSED)).toEqual({
        statusCode: 503,
        body: {
          error: 'Service Unavailable',
          message: 'The relay is paused by an admin. New transfers are not accepted.',
          code: 'TRANSFERS_PAUSED',
        },
      });
    });

    it('takes a custom message and details', () => {
      const { body } = createErrorResponse(ErrorCode.VALIDATION_ERROR, 'handle: too long', { field: 'handle' });

      expect(body).toEqual({
        error: 'Bad Request',
        message: 'handle: too long',
        code: 'VALIDATION_ERROR',
        details: { field: 'handle' },
      });
    });
  });

  describe('sendError', () => {
    it('sends the status and body', () => {
      sendError(mockRes, ErrorCode.TRANSFER_NOT_FOUND);

      expect(mockRes.status).toHaveBeenCalledWith(404);
      expect(mockRes.json).toHaveBeenCalledWith({
        error: 'Not Found',
        message: 'Transfer not found',
        code: 'TRANSFER_NOT_FOUND',
      });
    });
  });

  describe('convenience senders', () => {
    it('sendBadRequest attaches the field', () => {
      sendBadRequest(mockRes, 'File name is required', 'file');

      expect(mockRes.status).toHaveBeenCalledWith(400);
      expect(mockRes.json).toHaveBeenCalledWith({
        error: 'Bad Request',
        message: 'File name is required',
        code: 'VALIDATION_ERROR',
        details: { field: 'file' },
      });
    });

    it('sendUnauthorized defaults to UNAUTHORIZED', () => {
      sendUnauthorized(mockRes);
      expect(mockRes.status).toHaveBeenCalledWith(401);
    });

    it('sendForbidden takes a specific code', () => {
      sendForbidden(mockRes, ErrorCode.ADMIN_REQUIRED);

      expect(mockRes.status).toHaveBeenCalledWith(403);
      expect(mockRes.json).toHaveBeenCalledWith(expect.objectContaining({ code: 'ADMIN_REQUIRED' }));
    });

    it('sendNotFound and sendInternalError use the safe defaults', () => {
      sendNotFound(mockRes);
      expect(mockRes.status).toHaveBeenLastCalledWith(404);

      sendInternalError(mockRes);
      expect(mockRes.status).toHaveBeenLastCalledWith(500);
      expect(mockRes.json).toHaveBeenLastCalledWith(expect.objectContaining({ code: 'INTERNAL_ERROR' }));
    });
  });
});
