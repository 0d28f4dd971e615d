/**
 * Name Validation Utilities
 *
 * Validation and sanitization for uploaded file names before they become
 * part of a blob path.
 *
 * Validation Rules:
 * - Maximum length: 255 characters
 * - No path traversal patterns (.., /, \)
 * - No control characters (0x00-0x1F)
 * - No reserved characters (<>:"|?*)
 *
 * @module @blob-relay/shared/utils/nameValidation
 */

// ============================================================================
// CONFIGURATION
// ============================================================================

export const NAME_VALIDATION_CONFIG = {
  MAX_NAME_LENGTH: 255,

  FORBIDDEN_PATTERNS: [
    { pattern: /\.\./, reason: 'Path traversal (..) not allowed' },
    { pattern: /[\\/]/, reason: 'Path separators (/ or \\) not allowed in names' },
    { pattern: /[\x00-\x1f]/, reason: 'Control characters not allowed' },
    { pattern: /[<>:"|?*]/, reason: 'Special characters (<>:"|?*) not allowed' },
  ] as const,
} as const;

// ============================================================================
// TYPES
// ============================================================================

export interface NameValidationResult {
  isValid: boolean;

  /** Only present if isValid = false */
  reason?: string;

  /** Only present if the name can be fixed */
  sanitized?: string;
}

// ============================================================================
// VALIDATION FUNCTIONS
// ============================================================================

/**
 * Validate a file name
 *
 * @example
 * ```typescript
 * const result = validateFileName('report<1>.pdf');
 * // { isValid: false, reason: 'Special characters ...', sanitized: 'report_1_.pdf' }
 * ```
 */
export function validateFileName(
  name: string,
  maxLength: number = NAME_VALIDATION_CONFIG.MAX_NAME_LENGTH
): NameValidationResult {
  if (!name || name.trim().length === 0) {
    return { isValid: false, reason: 'File name cannot be empty' };
  }

  if (name.length > maxLength) {
    return {
      isValid: false,
      reason: `File name exceeds maximum length of ${maxLength} characters`,
      sanitized: sanitizeName(name, maxLength),
    };
  }

  for (const { pattern, reason } of NAME_VALIDATION_CONFIG.FORBIDDEN_PATTERNS) {
    if (pattern.test(name)) {
      return { isValid: false, reason, sanitized: sanitizeName(name, maxLength) };
    }
  }

  if (name !== name.trim() || name.endsWith('.')) {
    return {
      isValid: false,
      reason: 'File name cannot have leading/trailing whitespace or end with a dot',
      sanitized: sanitizeName(name, maxLength),
    };
  }

  return { isValid: true };
}

/**
 * Sanitize a name by removing or replacing invalid characters
 *
 * Transformations:
 * - Remove control characters
 * - Replace forbidden characters with underscore
 * - Trim whitespace and trailing dots
 * - Truncate to max length, keeping a short extension
 *
 * @example
 * ```typescript
 * sanitizeName('file<name>.txt'); // 'file_name_.txt'
 * ```
 */
export function sanitizeName(
  name: string,
  maxLength: number = NAME_VALIDATION_CONFIG.MAX_NAME_LENGTH
): string {
  if (!name) {
    return 'unnamed';
  }

  let sanitized = name;

  sanitized = sanitized.replace(/[\x00-\x1f]/g, '');
  sanitized = sanitized.replace(/[<>:"|?*\\/]/g, '_');
  sanitized = sanitized.replace(/\.\./g, '_');
  sanitized = sanitized.trim().replace(/[. ]+$/, '');

  if (sanitized.length > maxLength) {
    const lastDot = sanitized.lastIndexOf('.');
    if (lastDot > 0 && lastDot > sanitized.length - 10) {
      const extension = sanitized.substring(lastDot);
      sanitized = sanitized.substring(0, maxLength - extension.length) + extension;
    } else {
      sanitized = sanitized.substring(0, maxLength);
    }
  }

  if (sanitized.trim().length === 0) {
    return 'unnamed';
  }

  return sanitized;
}
