/**
 * HTTP request/response logging middleware using pino-http
 *
 * - Request ID reused from X-Request-ID or generated
 * - Log level follows the response status (5xx error, 4xx warn)
 * - The caller's X-User-Handle is logged; credentials are redacted
 *
 * Usage:
 * ```typescript
 * app.use(httpLogger);
 *
 * app.get('/api/data', (req, res) => {
 *   req.log.info('Fetching data');
 * });
 * ```
 */

import pinoHttp from 'pino-http';
import type { RequestHandler } from 'express';
import type { IncomingMessage, ServerResponse } from 'http';
import { logger } from '@/shared/utils/logger';

const HEALTH_ENDPOINTS = ['/health', '/ping', '/ready', '/live'];

export const httpLogger: RequestHandler = pinoHttp({
  logger,

  genReqId: (req: IncomingMessage, res: ServerResponse) => {
    const existingId = req.headers['x-request-id'];
    if (existingId && typeof existingId === 'string') {
      return existingId;
    }

    const id = `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
    res.setHeader('X-Request-ID', id);
    return id;
  },

  customLogLevel: (_req: IncomingMessage, res: ServerResponse, err?: Error) => {
    if (err || res.statusCode >= 500) return 'error';
    if (res.statusCode >= 400) return 'warn';
    return 'info';
  },

  customSuccessMessage: (req: IncomingMessage, res: ServerResponse) => {
    return `${req.method} ${req.url} ${res.statusCode}`;
  },

  customErrorMessage: (req: IncomingMessage, res: ServerResponse, err: Error) => {
    return `${req.method} ${req.url} ${res.statusCode} - ${err.message}`;
  },

  serializers: {
    req: (req) => ({
      id: req.id,
      method: req.method,
      url: req.url,
      userHandle: req.headers['x-user-handle'],
      headers: {
        ...req.headers,
        authorization: req.headers.authorization ? '[REDACTED]' : undefined,
        cookie: req.headers.cookie ? '[REDACTED]' : undefined,
      },
    }),
    res: (res) => ({
      statusCode: res.statusCode,
    }),
  },

  autoLogging: {
    ignore: (req: IncomingMessage) => HEALTH_ENDPOINTS.includes(req.url || ''),
  },
});
