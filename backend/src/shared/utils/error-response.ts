/**
 * Error Response Utilities
 *
 * Helper functions for sending standardized error responses.
 * All routes should use these functions instead of manual res.status().json().
 *
 * @module shared/utils/error-response
 */

import type { Response } from 'express';
import {
  ErrorCode,
  ERROR_MESSAGES,
  ERROR_STATUS_CODES,
  getHttpStatusName,
} from '@blob-relay/shared';
import type { ApiErrorResponse, ErrorResponseWithStatus } from '@blob-relay/shared';

type ErrorDetails = Record<string, string | number | boolean>;

/**
 * Create error response object without sending
 *
 * @example
 * const { statusCode, body } = createErrorResponse(ErrorCode.TRANSFERS_PAUSED);
 * // statusCode: 503
 * // body: { error: "Service Unavailable", message: "The relay is paused ...", code: "TRANSFERS_PAUSED" }
 */
export function createErrorResponse(
  code: ErrorCode,
  customMessage?: string,
  details?: ErrorDetails
): ErrorResponseWithStatus {
  const statusCode = ERROR_STATUS_CODES[code];
  const body: ApiErrorResponse = {
    error: getHttpStatusName(statusCode),
    message: customMessage ?? ERROR_MESSAGES[code],
    code,
  };

  if (details !== undefined) {
    body.details = details;
  }

  return { statusCode, body };
}

/**
 * Send standardized error response
 *
 * @example
 * sendError(res, ErrorCode.TRANSFER_NOT_FOUND);
 * // 404 { error: "Not Found", message: "Transfer not found", code: "TRANSFER_NOT_FOUND" }
 */
export function sendError(
  res: Response,
  code: ErrorCode,
  customMessage?: string,
  details?: ErrorDetails
): void {
  const { statusCode, body } = createErrorResponse(code, customMessage, details);
  res.status(statusCode).json(body);
}

/**
 * Send 400 Bad Request error for a validation problem
 */
export function sendBadRequest(res: Response, message: string, field?: string): void {
  sendError(res, ErrorCode.VALIDATION_ERROR, message, field ? { field } : undefined);
}

export function sendUnauthorized(res: Response, code: ErrorCode = ErrorCode.UNAUTHORIZED): void {
  sendError(res, code);
}

export function sendForbidden(res: Response, code: ErrorCode = ErrorCode.FORBIDDEN): void {
  sendError(res, code);
}

export function sendNotFound(res: Response, code: ErrorCode = ErrorCode.NOT_FOUND): void {
  sendError(res, code);
}

/**
 * Send 500 Internal Server Error
 *
 * NEVER pass the actual error message - log it and send the safe default.
 */
export function sendInternalError(res: Response, code: ErrorCode = ErrorCode.INTERNAL_ERROR): void {
  sendError(res, code);
}
