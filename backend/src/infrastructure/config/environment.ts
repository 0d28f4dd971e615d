/**
 * Environment Configuration
 *
 * Loads and validates environment variables.
 *
 * @module infrastructure/config/environment
 */

import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { TRANSFER_CONFIG, parseHandleList } from '@blob-relay/shared';

// Load .env file (override: false preserves existing env vars for testing)
dotenv.config({ override: false });

const MEGABYTE = 1024 * 1024;

/**
 * Environment variables schema for validation
 */
const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3001').transform(Number).pipe(z.number().min(1000).max(65535)),

  // CORS
  CORS_ORIGIN: z.string().default('http://localhost:3000'),

  // Logging (read by the logger straight from process.env, validated here)
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'silent']).default('info'),
  LOG_SERVICES: z.string().optional(),
  ENABLE_FILE_LOGGING: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  LOG_FILE_PATH: z.string().min(1).default('./logs/app.log'),
  ERROR_LOG_FILE_PATH: z.string().min(1).default('./logs/error.log'),

  // Storage
  STORAGE_CONNECTION_STRING: z.string().optional(),
  STORAGE_CONTAINER_NAME: z.string().min(3).max(63).default('relay-uploads'),
  STORAGE_PATH_PREFIX: z.string().default('uploads/'),

  // Transfers
  TRANSFER_BLOCK_SIZE_MB: z
    .string()
    .default(String(TRANSFER_CONFIG.BLOCK_SIZE_BYTES / MEGABYTE))
    .transform(Number)
    .pipe(z.number().min(1).max(100)),
  TRANSFER_PROGRESS_INTERVAL_MS: z
    .string()
    .default(String(TRANSFER_CONFIG.PROGRESS_INTERVAL_MS))
    .transform(Number)
    .pipe(z.number().int().min(TRANSFER_CONFIG.PROGRESS_INTERVAL_MS)),
  TRANSFER_HISTORY_LIMIT: z
    .string()
    .default(String(TRANSFER_CONFIG.HISTORY_LIMIT))
    .transform(Number)
    .pipe(z.number().int().min(0)),

  // Uploads
  UPLOAD_MAX_MB: z.string().default('2048').transform(Number).pipe(z.number().positive()),
  UPLOAD_TMP_DIR: z.string().default(path.join(os.tmpdir(), 'blob-relay-uploads')),

  // Admins (comma-separated handles)
  PERMANENT_ADMINS: z.string().default(''),
  EXTRA_ADMINS: z.string().default(''),
});

/**
 * Parse and validate a set of environment variables
 *
 * @throws Error listing every invalid variable
 */
export function loadEnvironment(source: NodeJS.ProcessEnv) {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`
    );
    throw new Error(`Invalid environment variables: ${issues.join('; ')}`);
  }

  const data = parsed.data;

  return {
    ...data,
    TRANSFER_BLOCK_SIZE_BYTES: Math.floor(data.TRANSFER_BLOCK_SIZE_MB * MEGABYTE),
    UPLOAD_MAX_BYTES: Math.floor(data.UPLOAD_MAX_MB * MEGABYTE),
    PERMANENT_ADMIN_HANDLES: parseHandleList(
      [data.PERMANENT_ADMINS, data.EXTRA_ADMINS].filter(Boolean).join(',')
    ),
  };
}

export type Environment = ReturnType<typeof loadEnvironment>;

/**
 * Typed environment configuration
 */
export const env: Environment = loadEnvironment(process.env);

export const isProd = env.NODE_ENV === 'production';

/**
 * Configuration summary without secrets
 */
export function describeConfig(config: Environment = env): Record<string, string | number | boolean> {
  return {
    environment: config.NODE_ENV,
    port: config.PORT,
    corsOrigin: config.CORS_ORIGIN,
    storageConfigured: Boolean(config.STORAGE_CONNECTION_STRING),
    container: config.STORAGE_CONTAINER_NAME,
    pathPrefix: config.STORAGE_PATH_PREFIX,
    blockSizeBytes: config.TRANSFER_BLOCK_SIZE_BYTES,
    progressIntervalMs: config.TRANSFER_PROGRESS_INTERVAL_MS,
    fileLogging: config.ENABLE_FILE_LOGGING,
    uploadMaxBytes: config.UPLOAD_MAX_BYTES,
    permanentAdmins: config.PERMANENT_ADMIN_HANDLES.length,
  };
}
