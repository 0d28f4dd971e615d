import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  getErrorStatusCode,
  getHttpStatusName,
  validateErrorConstants,
} from '../errors';
import { isApiErrorResponse } from '../../types/error.types';
import { getStatusRoom } from '../transfer.constants';

describe('error constants', () => {
  it('maps every code to a message, status and status name', () => {
    expect(validateErrorConstants()).toEqual([]);
  });

  it('reports a paused relay as 503', () => {
    expect(getErrorStatusCode(ErrorCode.TRANSFERS_PAUSED)).toBe(503);
    expect(getHttpStatusName(503)).toBe('Service Unavailable');
  });

  it('falls back to "Error" for unknown status codes', () => {
    expect(getHttpStatusName(418)).toBe('Error');
  });
});

describe('isApiErrorResponse', () => {
  it('accepts a well-formed body', () => {
    expect(
      isApiErrorResponse({ error: 'Not Found', message: 'Transfer not found', code: 'TRANSFER_NOT_FOUND' })
    ).toBe(true);
  });

  it('rejects unknown codes and non-objects', () => {
    expect(isApiErrorResponse({ error: 'x', message: 'y', code: 'NOPE' })).toBe(false);
    expect(isApiErrorResponse(null)).toBe(false);
  });
});

describe('getStatusRoom', () => {
  it('prefixes the handle', () => {
    expect(getStatusRoom('abc-1')).toBe('status:abc-1');
  });
});
