/**
 * Transfer Validation Schemas
 *
 * Zod schemas for transfer submissions, admin commands and socket
 * subscriptions.
 *
 * @module @blob-relay/shared/schemas/transfer
 */

import { z } from 'zod';
import { normalizeUserHandle } from '../utils/userHandle';

// ============================================
// Base Schemas
// ============================================

/**
 * Status handle (room key) chosen by the client
 */
export const statusHandleSchema = z
  .string()
  .trim()
  .min(1, 'Status handle cannot be empty')
  .max(128, 'Status handle too long (max 128 chars)')
  .regex(/^[A-Za-z0-9_-]+$/, 'Status handle may only contain letters, digits, "_" and "-"');

/**
 * Transfer job id; normalized to UPPERCASE per project conventions
 */
export const transferIdSchema = z
  .string()
  .uuid('Invalid transfer ID format')
  .transform((val) => val.toUpperCase());

/**
 * User handle; normalized to the `@name` form
 */
export const userHandleSchema = z
  .string()
  .trim()
  .min(1, 'Handle cannot be empty')
  .max(64, 'Handle too long (max 64 chars)')
  .regex(/^@?[A-Za-z0-9_]+$/, 'Handle may only contain letters, digits and "_"')
  .transform(normalizeUserHandle);

// ============================================
// Request Schemas
// ============================================

/**
 * Multipart body fields sent with an upload
 *
 * The file itself is handled by multer, not this schema.
 */
export const submitTransferBodySchema = z.object({
  statusHandle: statusHandleSchema.optional(),
});

export type SubmitTransferBody = z.infer<typeof submitTransferBodySchema>;

export const transferIdParamsSchema = z.object({
  jobId: transferIdSchema,
});

export const adminHandleBodySchema = z.object({
  handle: userHandleSchema,
});

export type AdminHandleBody = z.infer<typeof adminHandleBodySchema>;

export const transferSubscriptionSchema = z.object({
  statusHandle: statusHandleSchema,
});

// ============================================
// Helpers
// ============================================

/**
 * Safe validation returning a discriminated result
 */
export function validateSafe<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): { success: true; data: z.output<T> } | { success: false; error: z.ZodError } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * First issue as "path: message", for error responses
 */
export function formatFirstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'Invalid request';
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}
