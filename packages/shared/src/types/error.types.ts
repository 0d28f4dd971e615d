/**
 * Error Response Type Definitions
 *
 * Types for standardized API error responses.
 *
 * @module @blob-relay/shared/types/error
 */

import { ErrorCode } from '../constants/errors';

/**
 * Standard API Error Response
 *
 * @example
 * // Response body for a paused relay
 * {
 *   "error": "Service Unavailable",
 *   "message": "The relay is paused by an admin. New transfers are not accepted.",
 *   "code": "TRANSFERS_PAUSED"
 * }
 */
export interface ApiErrorResponse {
  /** HTTP status name (e.g. "Not Found") */
  error: string;

  /** Safe for display to end users */
  message: string;

  code: ErrorCode;

  details?: Record<string, string | number | boolean>;

  requestId?: string;
}

/**
 * Used internally to build an error response without sending it
 */
export interface ErrorResponseWithStatus {
  statusCode: number;
  body: ApiErrorResponse;
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

export function isValidErrorCode(code: string): code is ErrorCode {
  return Object.values<string>(ErrorCode).includes(code);
}

/**
 * Type guard to check if an object is an ApiErrorResponse
 */
export function isApiErrorResponse(obj: unknown): obj is ApiErrorResponse {
  if (typeof obj !== 'object' || obj === null) {
    return false;
  }
  if (!('error' in obj) || !('message' in obj) || !('code' in obj)) {
    return false;
  }

  return (
    typeof obj.error === 'string' &&
    typeof obj.message === 'string' &&
    typeof obj.code === 'string' &&
    isValidErrorCode(obj.code)
  );
}
