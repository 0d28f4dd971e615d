/**
 * Utils Index
 *
 * @module @blob-relay/shared/utils
 */

export {
  NAME_VALIDATION_CONFIG,
  validateFileName,
  sanitizeName,
} from './nameValidation';
export type { NameValidationResult } from './nameValidation';

export { defaultStatusHandle, normalizeUserHandle, parseHandleList } from './userHandle';
