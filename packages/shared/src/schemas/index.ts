/**
 * Request Validation Schemas
 *
 * @module @blob-relay/shared/schemas
 */

export {
  statusHandleSchema,
  transferIdSchema,
  userHandleSchema,
  submitTransferBodySchema,
  transferIdParamsSchema,
  adminHandleBodySchema,
  transferSubscriptionSchema,
  validateSafe,
  formatFirstIssue,
} from './transfer.schemas';
export type { SubmitTransferBody, AdminHandleBody } from './transfer.schemas';
