/**
 * BlobTransferBackend
 *
 * ITransferBackend over Azure Blob Storage block uploads. The payload is
 * staged block by block; the cancellation predicate is checked before each
 * block and the lease signal aborts the in-flight request. Progress is the
 * fraction of bytes staged.
 *
 * Blob path: {prefix}{requesterId}/{timestamp}-{sanitized-filename}
 *
 * @module infrastructure/storage/BlobTransferBackend
 */

import { BlobServiceClient, RestError } from '@azure/storage-blob';
import type { Logger } from 'pino';
import { TRANSFER_CONFIG, sanitizeName } from '@blob-relay/shared';
import { env, type Environment } from '@/infrastructure/config';
import { createChildLogger } from '@/shared/utils/logger';
import { TransferAuthError, TransferFailure, errorMessage } from '@/domains/transfers/errors';
import type {
  ITransferBackend,
  TransferContext,
  TransferOutcome,
  TransferRequest,
} from '@/domains/transfers/ITransferBackend';

/** Error codes storage returns for rejected credentials */
const AUTH_ERROR_CODES = new Set([
  'AuthenticationFailed',
  'AuthorizationFailure',
  'AuthorizationPermissionMismatch',
  'InvalidAuthenticationInfo',
]);

export const STORAGE_AUTH_REMEDIATION =
  'Check STORAGE_CONNECTION_STRING and the storage account access keys, then resume the relay.';

/**
 * The slice of BlockBlobClient used for staged uploads
 */
export interface BlockUploadTarget {
  stageBlock(
    blockId: string,
    body: Buffer,
    contentLength: number,
    options?: { abortSignal?: AbortSignal }
  ): Promise<unknown>;
  commitBlockList(
    blocks: string[],
    options?: { blobHTTPHeaders?: { blobContentType?: string }; abortSignal?: AbortSignal }
  ): Promise<unknown>;
}

/**
 * The slice of ContainerClient the backend needs
 */
export interface BlockContainer {
  getBlockBlobClient(blobName: string): BlockUploadTarget;
}

export interface BlobTransferBackendDependencies {
  container: BlockContainer;
  blockSize?: number;
  pathPrefix?: string;
  now?: () => number;
  logger?: Logger;
}

export class BlobTransferBackend implements ITransferBackend {
  private readonly container: BlockContainer;
  private readonly blockSize: number;
  private readonly pathPrefix: string;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(deps: BlobTransferBackendDependencies) {
    this.container = deps.container;
    this.blockSize = deps.blockSize ?? TRANSFER_CONFIG.BLOCK_SIZE_BYTES;
    this.pathPrefix = deps.pathPrefix ?? '';
    this.now = deps.now ?? Date.now;
    this.log = deps.logger ?? createChildLogger({ service: 'BlobTransferBackend' });
  }

  /**
   * @example
   * generateBlobPath('@alice', 'Q3: report.pdf')
   * // => 'uploads/@alice/1733683200000-Q3_ report.pdf'
   */
  generateBlobPath(requesterId: string, fileName: string): string {
    return `${this.pathPrefix}${requesterId}/${this.now()}-${sanitizeName(fileName)}`;
  }

  async transfer(request: TransferRequest, context: TransferContext): Promise<TransferOutcome> {
    const blobPath = this.generateBlobPath(request.requesterId, request.fileName);
    const blockBlob = this.container.getBlockBlobClient(blobPath);
    const total = request.data.length;
    const blockIds: string[] = [];

    try {
      // Empty files stage nothing and commit an empty block list
      for (let offset = 0, index = 0; offset < total; offset += this.blockSize, index++) {
        if (context.isCancelled()) {
          this.log.info({ jobId: request.jobId, blobPath, staged: offset }, 'Upload cancelled');
          return { kind: 'cancelled' };
        }

        const end = Math.min(offset + this.blockSize, total);
        const chunk = request.data.subarray(offset, end);
        const blockId = toBlockId(index);

        await blockBlob.stageBlock(blockId, chunk, chunk.length, { abortSignal: context.signal });
        blockIds.push(blockId);
        context.progress.push(end / total);
      }

      if (context.isCancelled()) {
        return { kind: 'cancelled' };
      }

      await blockBlob.commitBlockList(blockIds, {
        blobHTTPHeaders: { blobContentType: request.contentType },
        abortSignal: context.signal,
      });
      if (total === 0) {
        context.progress.push(1);
      }

      this.log.info(
        { jobId: request.jobId, blobPath, size: total, blocks: blockIds.length },
        'Blob uploaded'
      );
      return { kind: 'completed', destinationId: blobPath };
    } catch (error) {
      if (context.isCancelled()) {
        return { kind: 'cancelled' };
      }
      this.log.error({ jobId: request.jobId, blobPath, error: errorMessage(error) }, 'Blob upload failed');
      return { kind: 'failed', error: classifyStorageError(error) };
    }
  }
}

/**
 * Fixed-width base64 block id; every id in a blob must have the same length
 */
export function toBlockId(index: number): string {
  return Buffer.from(String(index).padStart(6, '0')).toString('base64');
}

export function isStorageAuthError(error: unknown): boolean {
  if (!(error instanceof RestError)) {
    return false;
  }
  return (
    error.statusCode === 401 ||
    error.statusCode === 403 ||
    (error.code !== undefined && AUTH_ERROR_CODES.has(error.code))
  );
}

export function classifyStorageError(error: unknown): TransferAuthError | TransferFailure {
  if (isStorageAuthError(error)) {
    return new TransferAuthError(errorMessage(error), STORAGE_AUTH_REMEDIATION, { cause: error });
  }
  return new TransferFailure(errorMessage(error), 'transfer', { cause: error });
}

/**
 * Build the backend from configuration
 *
 * @throws Error when STORAGE_CONNECTION_STRING is missing
 */
export function createBlobTransferBackend(config: Environment = env): BlobTransferBackend {
  if (!config.STORAGE_CONNECTION_STRING) {
    throw new Error('STORAGE_CONNECTION_STRING is required');
  }

  const service = BlobServiceClient.fromConnectionString(config.STORAGE_CONNECTION_STRING);
  const container = service.getContainerClient(config.STORAGE_CONTAINER_NAME);

  return new BlobTransferBackend({
    container,
    blockSize: config.TRANSFER_BLOCK_SIZE_BYTES,
    pathPrefix: config.STORAGE_PATH_PREFIX,
  });
}
