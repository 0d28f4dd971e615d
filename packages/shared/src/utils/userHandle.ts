/**
 * User Handle Utilities
 *
 * Handles are either `@name` or a numeric account id. Input without the
 * leading `@` is normalized so `alice` and `@alice` compare equal.
 *
 * @module @blob-relay/shared/utils/userHandle
 */

const NUMERIC_ID = /^\d+$/;

/**
 * @example
 * normalizeUserHandle(' alice ')  // '@alice'
 * normalizeUserHandle('@bob')     // '@bob'
 * normalizeUserHandle('1234567')  // '1234567'
 */
export function normalizeUserHandle(handle: string): string {
  const trimmed = handle.trim();
  if (trimmed.length === 0) return '';
  if (trimmed.startsWith('@') || NUMERIC_ID.test(trimmed)) {
    return trimmed;
  }
  return `@${trimmed}`;
}

/**
 * Parse a comma-separated handle list (as found in env vars).
 * Empty entries are skipped; duplicates collapse.
 */
export function parseHandleList(value: string | undefined): string[] {
  if (!value) return [];
  const handles = value
    .split(',')
    .map(normalizeUserHandle)
    .filter((handle) => handle.length > 0);
  return Array.from(new Set(handles));
}

/**
 * Status handle used when a submitter does not name one: their own handle
 * without the leading "@", other characters outside `[A-Za-z0-9_-]` as "_"
 */
export function defaultStatusHandle(userHandle: string): string {
  return userHandle.replace(/^@/, '').replace(/[^A-Za-z0-9_-]/g, '_');
}
