/**
 * BlobTransferBackend Unit Tests
 *
 * Block staging, progress, cancellation and storage error classification,
 * against an in-memory container client.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RestError } from '@azure/storage-blob';
import {
  BlobTransferBackend,
  STORAGE_AUTH_REMEDIATION,
  classifyStorageError,
  createBlobTransferBackend,
  toBlockId,
  type BlockContainer,
  type BlockUploadTarget,
} from '@/infrastructure/storage/BlobTransferBackend';
import { TransferAuthError, TransferFailure } from '@/domains/transfers/errors';
import { loadEnvironment } from '@/infrastructure/config/environment';
import type { TransferContext, TransferRequest } from '@/domains/transfers/ITransferBackend';

vi.mock('@/shared/utils/logger', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
}));

// ============================================================================
// TEST UTILITIES
// ============================================================================

function createTarget(): BlockUploadTarget & {
  stageBlock: ReturnType<typeof vi.fn>;
  commitBlockList: ReturnType<typeof vi.fn>;
} {
  return {
    stageBlock: vi.fn().mockResolvedValue({}),
    commitBlockList: vi.fn().mockResolvedValue({}),
  };
}

function createContext(overrides: Partial<TransferContext> = {}): TransferContext & { pushed: number[] } {
  const pushed: number[] = [];
  return {
    pushed,
    progress: { push: (fraction: number) => pushed.push(fraction) },
    isCancelled: () => false,
    signal: new AbortController().signal,
    ...overrides,
  };
}

function request(data: string, overrides: Partial<TransferRequest> = {}): TransferRequest {
  return {
    jobId: 'JOB-1',
    requesterId: '@owner',
    fileName: 'Q3 report.pdf',
    contentType: 'application/pdf',
    data: Buffer.from(data),
    ...overrides,
  };
}

describe('BlobTransferBackend', () => {
  let target: ReturnType<typeof createTarget>;
  let container: BlockContainer & { getBlockBlobClient: ReturnType<typeof vi.fn> };
  let backend: BlobTransferBackend;

  beforeEach(() => {
    target = createTarget();
    container = { getBlockBlobClient: vi.fn().mockReturnValue(target) };
    backend = new BlobTransferBackend({
      container,
      blockSize: 4,
      pathPrefix: 'uploads/',
      now: () => 1733683200000,
    });
  });

  describe('generateBlobPath', () => {
    it('scopes the blob under the requester with a timestamp and a sanitized name', () => {
      expect(backend.generateBlobPath('@owner', 'Q3 report.pdf')).toBe(
        'uploads/@owner/1733683200000-Q3 report.pdf'
      );
      expect(backend.generateBlobPath('@owner', 'Q3: report.pdf')).toBe(
        'uploads/@owner/1733683200000-Q3_ report.pdf'
      );
    });
  });

  describe('transfer', () => {
    it('stages fixed-size blocks, reports progress and commits', async () => {
      const context = createContext();

      const outcome = await backend.transfer(request('0123456789'), context);

      expect(outcome).toEqual({ kind: 'completed', destinationId: 'uploads/@owner/1733683200000-Q3 report.pdf' });
      expect(container.getBlockBlobClient).toHaveBeenCalledWith('uploads/@owner/1733683200000-Q3 report.pdf');
      expect(target.stageBlock.mock.calls.map((call) => [call[0], String(call[1]), call[2]])).toEqual([
        [toBlockId(0), '0123', 4],
        [toBlockId(1), '4567', 4],
        [toBlockId(2), '89', 2],
      ]);
      expect(context.pushed).toEqual([0.4, 0.8, 1]);
      expect(target.commitBlockList).toHaveBeenCalledWith([toBlockId(0), toBlockId(1), toBlockId(2)], {
        blobHTTPHeaders: { blobContentType: 'application/pdf' },
        abortSignal: context.signal,
      });
    });

    it('commits an empty block list for an empty file without staging a block', async () => {
      const context = createContext();

      const outcome = await backend.transfer(request(''), context);

      expect(outcome).toEqual({ kind: 'completed', destinationId: 'uploads/@owner/1733683200000-Q3 report.pdf' });
      expect(target.stageBlock).not.toHaveBeenCalled();
      expect(target.commitBlockList).toHaveBeenCalledWith([], {
        blobHTTPHeaders: { blobContentType: 'application/pdf' },
        abortSignal: context.signal,
      });
      expect(context.pushed).toEqual([1]);
    });

    it('stops between blocks once cancelled', async () => {
      let staged = 0;
      target.stageBlock.mockImplementation(async () => {
        staged++;
      });
      const context = createContext({ isCancelled: () => staged >= 2 });

      const outcome = await backend.transfer(request('0123456789'), context);

      expect(outcome).toEqual({ kind: 'cancelled' });
      expect(target.stageBlock).toHaveBeenCalledTimes(2);
      expect(target.commitBlockList).not.toHaveBeenCalled();
    });

    it('treats an aborted request as a cancellation', async () => {
      const controller = new AbortController();
      target.stageBlock.mockImplementation(async () => {
        controller.abort();
        throw new Error('The operation was aborted.');
      });
      const context = createContext({
        signal: controller.signal,
        isCancelled: () => controller.signal.aborted,
      });

      expect(await backend.transfer(request('0123'), context)).toEqual({ kind: 'cancelled' });
    });

    it('fails with an auth error when storage rejects the credentials', async () => {
      target.stageBlock.mockRejectedValue(
        new RestError('Server failed to authenticate the request.', { statusCode: 403, code: 'AuthenticationFailed' })
      );

      const outcome = await backend.transfer(request('0123'), createContext());

      expect(outcome.kind).toBe('failed');
      if (outcome.kind === 'failed') {
        expect(outcome.error).toBeInstanceOf(TransferAuthError);
        expect(outcome.error.message).toBe('Server failed to authenticate the request.');
      }
    });

    it('fails with a transfer error on anything else', async () => {
      target.commitBlockList.mockRejectedValue(new Error('connect ECONNREFUSED'));

      const outcome = await backend.transfer(request('0123'), createContext());

      expect(outcome).toEqual({ kind: 'failed', error: expect.any(TransferFailure) });
      if (outcome.kind === 'failed') {
        expect(outcome.error.kind).toBe('transfer');
        expect(outcome.error.message).toBe('connect ECONNREFUSED');
      }
    });
  });

  describe('classifyStorageError', () => {
    it('recognizes 401 responses', () => {
      const error = classifyStorageError(new RestError('No credentials', { statusCode: 401 }));

      expect(error).toBeInstanceOf(TransferAuthError);
      expect(error instanceof TransferAuthError && error.remediation).toBe(STORAGE_AUTH_REMEDIATION);
    });

    it('recognizes authorization error codes without a status', () => {
      expect(classifyStorageError(new RestError('denied', { code: 'AuthorizationFailure' }))).toBeInstanceOf(
        TransferAuthError
      );
    });

    it('treats other REST errors as transfer failures', () => {
      const error = classifyStorageError(new RestError('The specified container does not exist.', { statusCode: 404 }));

      expect(error).toBeInstanceOf(TransferFailure);
      expect(error.kind).toBe('transfer');
    });
  });

  describe('toBlockId', () => {
    it('produces ids of equal length', () => {
      expect(toBlockId(0)).toBe(Buffer.from('000000').toString('base64'));
      expect(toBlockId(0)).toHaveLength(toBlockId(12345).length);
    });
  });

  describe('createBlobTransferBackend', () => {
    it('requires a connection string', () => {
      const config = loadEnvironment({ NODE_ENV: 'test' });
      expect(() => createBlobTransferBackend(config)).toThrow('STORAGE_CONNECTION_STRING is required');
    });
  });
});
