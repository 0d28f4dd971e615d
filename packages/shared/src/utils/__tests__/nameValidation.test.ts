import { describe, it, expect } from 'vitest';
import { sanitizeName, validateFileName } from '../nameValidation';

describe('sanitizeName', () => {
  it('replaces reserved characters with underscores', () => {
    expect(sanitizeName('file<name>.txt')).toBe('file_name_.txt');
  });

  it('neutralizes path traversal', () => {
    expect(sanitizeName('../etc/passwd')).toBe('__etc_passwd');
  });

  it('strips trailing dots and spaces', () => {
    expect(sanitizeName('report. . ')).toBe('report');
  });

  it('falls back to "unnamed" for empty input', () => {
    expect(sanitizeName('')).toBe('unnamed');
  });

  it('truncates long names but keeps the extension', () => {
    const result = sanitizeName(`${'a'.repeat(300)}.pdf`);
    expect(result).toHaveLength(255);
    expect(result.endsWith('.pdf')).toBe(true);
  });
});

describe('validateFileName', () => {
  it('accepts ordinary names', () => {
    expect(validateFileName('invoice-2024.pdf')).toEqual({ isValid: true });
  });

  it('rejects empty names', () => {
    expect(validateFileName('  ')).toEqual({ isValid: false, reason: 'File name cannot be empty' });
  });

  it('rejects separators and offers a sanitized name', () => {
    const result = validateFileName('a/b.txt');
    expect(result.isValid).toBe(false);
    expect(result.sanitized).toBe('a_b.txt');
  });

  it('rejects a trailing dot', () => {
    const result = validateFileName('name.');
    expect(result.isValid).toBe(false);
    expect(result.sanitized).toBe('name');
  });
});
