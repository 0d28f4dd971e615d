/**
 * Transfer Payloads
 *
 * Handle to the bytes a job will upload. The job owns its payload and
 * disposes it once, when it reaches a terminal state.
 *
 * @module domains/transfers/payloads
 */

import { promises as fs } from 'fs';
import type { Logger } from 'pino';
import { errorMessage } from './errors';

export interface TransferPayload {
  readonly name: string;
  readonly contentType: string;
  /** Byte length when known at submission */
  readonly size: number | null;
  /** Materialize the bytes for upload */
  read(signal?: AbortSignal): Promise<Buffer>;
  /** Release whatever backs the payload (temp files, buffers) */
  dispose?(): Promise<void>;
}

export interface BufferPayloadInput {
  name: string;
  contentType: string;
  data: Buffer;
}

/**
 * Payload already held in memory
 */
export function createBufferPayload(input: BufferPayloadInput): TransferPayload {
  return {
    name: input.name,
    contentType: input.contentType,
    size: input.data.length,
    read: () => Promise.resolve(input.data),
  };
}

export interface FilePayloadInput {
  name: string;
  contentType: string;
  /** Path of the spooled upload on local disk */
  path: string;
  size?: number;
}

/**
 * Payload spooled to a local file (multer disk storage). Reading loads the
 * file; disposing removes it.
 */
export function createFilePayload(input: FilePayloadInput): TransferPayload {
  return {
    name: input.name,
    contentType: input.contentType,
    size: input.size ?? null,
    read: (signal?: AbortSignal) => fs.readFile(input.path, { signal }),
    dispose: () => fs.rm(input.path, { force: true }),
  };
}

/**
 * Dispose a payload, logging instead of throwing on failure
 */
export async function disposePayload(
  payload: TransferPayload,
  log: Pick<Logger, 'warn'>
): Promise<void> {
  if (!payload.dispose) {
    return;
  }
  try {
    await payload.dispose();
  } catch (error) {
    log.warn({ fileName: payload.name, error: errorMessage(error) }, 'Failed to dispose payload');
  }
}
