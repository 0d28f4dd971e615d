/**
 * Error Constants
 *
 * Centralized error codes, messages, and HTTP status mappings.
 * Backend routes send these through `sendError()`; clients branch on `code`.
 *
 * @module @blob-relay/shared/constants/errors
 */

/**
 * Machine-readable error codes
 */
export enum ErrorCode {
  // 400
  BAD_REQUEST = 'BAD_REQUEST',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  MISSING_FILE = 'MISSING_FILE',
  INVALID_FILE_NAME = 'INVALID_FILE_NAME',

  // 401 / 403
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  ADMIN_REQUIRED = 'ADMIN_REQUIRED',

  // 404
  NOT_FOUND = 'NOT_FOUND',
  TRANSFER_NOT_FOUND = 'TRANSFER_NOT_FOUND',
  ADMIN_NOT_FOUND = 'ADMIN_NOT_FOUND',

  // 409
  CONFLICT = 'CONFLICT',
  ADMIN_ALREADY_EXISTS = 'ADMIN_ALREADY_EXISTS',
  ADMIN_PERMANENT = 'ADMIN_PERMANENT',

  // 413
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',

  // 500 / 503
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  TRANSFERS_PAUSED = 'TRANSFERS_PAUSED',
}

/**
 * Human-readable names for the HTTP status codes we send
 */
export const HTTP_STATUS_NAMES: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  409: 'Conflict',
  413: 'Payload Too Large',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
};

/**
 * Default message per error code (safe to show to any user)
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.BAD_REQUEST]: 'Invalid request',
  [ErrorCode.VALIDATION_ERROR]: 'Request validation failed',
  [ErrorCode.MISSING_FILE]: 'A file must be attached in the "file" field',
  [ErrorCode.INVALID_FILE_NAME]: 'File name is not valid',
  [ErrorCode.UNAUTHORIZED]: 'Caller identity is missing',
  [ErrorCode.FORBIDDEN]: 'Access denied',
  [ErrorCode.ADMIN_REQUIRED]: 'This action is restricted to admins',
  [ErrorCode.NOT_FOUND]: 'Resource not found',
  [ErrorCode.TRANSFER_NOT_FOUND]: 'Transfer not found',
  [ErrorCode.ADMIN_NOT_FOUND]: 'User is not a dynamic admin',
  [ErrorCode.CONFLICT]: 'Request conflicts with current state',
  [ErrorCode.ADMIN_ALREADY_EXISTS]: 'User is already an admin',
  [ErrorCode.ADMIN_PERMANENT]: 'Permanent admins cannot be changed',
  [ErrorCode.PAYLOAD_TOO_LARGE]: 'File exceeds the upload size limit',
  [ErrorCode.INTERNAL_ERROR]: 'An internal error occurred',
  [ErrorCode.SERVICE_UNAVAILABLE]: 'Service temporarily unavailable',
  [ErrorCode.TRANSFERS_PAUSED]: 'The relay is paused by an admin. New transfers are not accepted.',
};

/**
 * HTTP status code per error code
 */
export const ERROR_STATUS_CODES: Record<ErrorCode, number> = {
  [ErrorCode.BAD_REQUEST]: 400,
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.MISSING_FILE]: 400,
  [ErrorCode.INVALID_FILE_NAME]: 400,
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.FORBIDDEN]: 403,
  [ErrorCode.ADMIN_REQUIRED]: 403,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.TRANSFER_NOT_FOUND]: 404,
  [ErrorCode.ADMIN_NOT_FOUND]: 404,
  [ErrorCode.CONFLICT]: 409,
  [ErrorCode.ADMIN_ALREADY_EXISTS]: 409,
  [ErrorCode.ADMIN_PERMANENT]: 409,
  [ErrorCode.PAYLOAD_TOO_LARGE]: 413,
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.SERVICE_UNAVAILABLE]: 503,
  [ErrorCode.TRANSFERS_PAUSED]: 503,
};

export function getHttpStatusName(statusCode: number): string {
  return HTTP_STATUS_NAMES[statusCode] ?? 'Error';
}

export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code];
}

export function getErrorStatusCode(code: ErrorCode): number {
  return ERROR_STATUS_CODES[code];
}

/**
 * Verify every ErrorCode has a message, a status code and a status name.
 * Returns the list of problems (empty when consistent).
 */
export function validateErrorConstants(): string[] {
  const problems: string[] = [];

  for (const code of Object.values(ErrorCode)) {
    if (!ERROR_MESSAGES[code]) {
      problems.push(`Missing message for ${code}`);
    }
    const status = ERROR_STATUS_CODES[code];
    if (status === undefined) {
      problems.push(`Missing status code for ${code}`);
    } else if (!HTTP_STATUS_NAMES[status]) {
      problems.push(`Missing status name for ${status} (${code})`);
    }
  }

  return problems;
}
