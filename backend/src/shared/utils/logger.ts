/**
 * Logger using Pino
 *
 * Features:
 * - JSON structured logging (production) / Pretty printing (development)
 * - Environment-based log levels (debug in dev, info in prod, silent in tests)
 * - Non-blocking transports running in worker threads
 * - Optional file logging
 * - Automatic redaction of secrets
 * - Child loggers per service
 *
 * Usage:
 * ```typescript
 * const log = createChildLogger({ service: 'TransferWorker' });
 * log.info({ jobId }, 'Transfer started');
 *
 * try {
 *   await operation();
 * } catch (err) {
 *   log.error({ err }, 'Operation failed');
 * }
 * ```
 */

import pino from 'pino';

// Environment-based configuration
const isTest = process.env.NODE_ENV === 'test';
const isDevelopment = process.env.NODE_ENV !== 'production';
const logLevel = isTest
  ? process.env.LOG_LEVEL || 'silent'
  : process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

// Service filtering for diagnostics (LOG_SERVICES=Service1,Service2,...)
const allowedServices = process.env.LOG_SERVICES?.split(',').map(s => s.trim()).filter(Boolean) ?? [];

type TransportTarget = pino.TransportTargetOptions;

function buildTargets(): TransportTarget[] {
  const targets: TransportTarget[] = [];

  if (isDevelopment) {
    targets.push({
      level: logLevel,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,env',
        singleLine: false,
        messageFormat: '[{service}] {msg}',
      },
    });
  } else {
    targets.push({
      level: logLevel,
      target: 'pino/file',
      options: { destination: 1 },
    });
  }

  if (process.env.ENABLE_FILE_LOGGING === 'true') {
    targets.push({
      level: 'info',
      target: 'pino/file',
      options: {
        destination: process.env.LOG_FILE_PATH || './logs/app.log',
        mkdir: true,
      },
    });

    targets.push({
      level: 'error',
      target: 'pino/file',
      options: {
        destination: process.env.ERROR_LOG_FILE_PATH || './logs/error.log',
        mkdir: true,
      },
    });
  }

  return targets;
}

const options: pino.LoggerOptions = {
  level: logLevel,

  serializers: {
    err: pino.stdSerializers.err,
    req: pino.stdSerializers.req,
    res: pino.stdSerializers.res,
  },

  base: {
    env: process.env.NODE_ENV,
    service: 'blob-relay',
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.cookie',
      'connectionString',
      'accountKey',
      'sasToken',
      'password',
      'token',
    ],
    remove: true,
  },
};

// Tests log nothing and must not spawn transport worker threads
export const logger: pino.Logger = isTest
  ? pino(options)
  : pino(options, pino.transport({ targets: buildTargets() }));

/**
 * Create a child logger with additional context
 *
 * Supports LOG_SERVICES for filtering: when set, services not listed get a
 * silent logger.
 *
 * @example
 * const log = createChildLogger({ service: 'PauseController' });
 * log.info({ drainedCount: 3 }, 'Relay paused');
 */
export const createChildLogger = (context: Record<string, unknown>): pino.Logger => {
  const serviceName = typeof context.service === 'string' ? context.service : undefined;

  if (allowedServices.length > 0 && serviceName && !allowedServices.includes(serviceName)) {
    return pino({ level: 'silent' });
  }

  return logger.child(context);
};
