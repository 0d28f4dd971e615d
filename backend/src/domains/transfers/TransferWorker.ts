/**
 * TransferWorker
 *
 * The single worker loop. An activation holds the ExecutionSlot lease and
 * takes jobs from the head of the queue, one at a time, until the queue is
 * empty, the relay is paused, or its lease is cancelled.
 *
 * Per job:
 * 1. queued → downloading, read the payload bytes
 * 2. downloading → uploading, hand the bytes to the transfer backend
 * 3. consume the progress channel, throttled per status handle
 * 4. apply the outcome: completed | failed | cancelled
 *
 * Nothing thrown inside a job escapes the loop: the job is failed and the
 * worker moves on.
 *
 * @module domains/transfers/TransferWorker
 */

import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import type { AdmissionQueue } from './AdmissionQueue';
import {
  TransferAuthError,
  TransferFailure,
  errorMessage,
  toTransferError,
  type TransferError,
} from './errors';
import { ExecutionSlot, type ExecutionLease } from './ExecutionSlot';
import type { ITransferBackend, TransferOutcome } from './ITransferBackend';
import type { PauseState } from './PauseState';
import { disposePayload } from './payloads';
import { ProgressChannel } from './ProgressChannel';
import { ProgressThrottler } from './ProgressThrottler';
import type { QueuePositionReporter } from './QueuePositionReporter';
import {
  FORCE_STOPPED_TEXT,
  authFailedText,
  completedText,
  downloadingText,
  failedText,
  progressText,
  uploadingText,
} from './status-messages';
import type { StatusNotifier } from './StatusNotifier';
import { canTransition, type TransferJob } from './TransferJob';

export interface TransferWorkerDependencies {
  queue: AdmissionQueue;
  pauseState: PauseState;
  backend: ITransferBackend;
  notifier: StatusNotifier;
  positions: QueuePositionReporter;
  throttler?: ProgressThrottler;
  slot?: ExecutionSlot;
  logger?: Logger;
}

export class TransferWorker {
  private readonly queue: AdmissionQueue;
  private readonly pauseState: PauseState;
  private readonly backend: ITransferBackend;
  private readonly notifier: StatusNotifier;
  private readonly positions: QueuePositionReporter;
  private readonly throttler: ProgressThrottler;
  private readonly slot: ExecutionSlot;
  private readonly log: Logger;

  private activation: Promise<void> | null = null;
  private activeJob: TransferJob | null = null;

  constructor(deps: TransferWorkerDependencies) {
    this.queue = deps.queue;
    this.pauseState = deps.pauseState;
    this.backend = deps.backend;
    this.notifier = deps.notifier;
    this.positions = deps.positions;
    this.throttler = deps.throttler ?? new ProgressThrottler();
    this.slot = deps.slot ?? new ExecutionSlot();
    this.log = deps.logger ?? createChildLogger({ service: 'TransferWorker' });
  }

  // ===== Control =====

  /**
   * Start an activation if the slot is free and there is work to do
   *
   * @returns false when an activation is already running, the relay is
   * paused, or the queue is empty
   */
  activate(): boolean {
    if (this.pauseState.isPaused() || this.queue.isEmpty()) {
      return false;
    }

    const lease = this.slot.tryAcquire();
    if (!lease) {
      return false;
    }

    const activation: Promise<void> = this.run(lease).then(() => {
      if (this.activation === activation) {
        this.activation = null;
      }
      // A submission may have arrived while this activation was winding down
      if (!this.queue.isEmpty() && !this.pauseState.isPaused()) {
        this.activate();
      }
    });
    this.activation = activation;
    return true;
  }

  /**
   * Signal the running job to stop
   *
   * @returns true when a job was running and has been signalled
   */
  cancelActive(reason = 'Relay paused'): boolean {
    const hadJob = this.activeJob !== null;
    const aborted = this.slot.cancelCurrent(reason);
    if (aborted && hadJob) {
      this.log.info({ jobId: this.activeJob?.id, reason }, 'Cancelling active transfer');
    }
    return aborted && hadJob;
  }

  /**
   * Resolves once no activation is running
   */
  async whenIdle(): Promise<void> {
    while (this.activation) {
      await this.activation;
    }
  }

  isBusy(): boolean {
    return this.slot.isBusy();
  }

  getActiveJob(): TransferJob | null {
    return this.activeJob;
  }

  // ===== Loop =====

  private async run(lease: ExecutionLease): Promise<void> {
    try {
      while (!this.pauseState.isPaused() && !lease.isCancelled()) {
        const job = this.queue.dequeue();
        if (!job) {
          break;
        }
        this.positions.publish();
        await this.executeJob(job, lease);
      }
    } finally {
      lease.release();
    }
  }

  private async executeJob(job: TransferJob, lease: ExecutionLease): Promise<void> {
    this.activeJob = job;
    const fileName = job.fileName;

    try {
      this.advance(job, 'downloading', downloadingText(fileName));

      let data: Buffer;
      try {
        data = await job.payload.read(lease.signal);
      } catch (error) {
        if (lease.isCancelled()) {
          this.finishCancelled(job);
        } else {
          this.finishFailed(job, toTransferError(error, 'download'));
        }
        return;
      }

      if (lease.isCancelled()) {
        this.finishCancelled(job);
        return;
      }

      this.advance(job, 'uploading', uploadingText(fileName));

      const channel = new ProgressChannel();
      const pump = this.pumpProgress(job, channel);
      let outcome: TransferOutcome;

      try {
        outcome = await this.backend.transfer(
          {
            jobId: job.id,
            requesterId: job.requesterId,
            fileName,
            contentType: job.payload.contentType,
            data,
          },
          {
            progress: channel,
            isCancelled: () => lease.isCancelled(),
            signal: lease.signal,
          }
        );
      } catch (error) {
        outcome = lease.isCancelled()
          ? { kind: 'cancelled' }
          : { kind: 'failed', error: toTransferError(error) };
      } finally {
        channel.close();
        await pump;
      }

      this.applyOutcome(job, outcome);
    } catch (error) {
      this.log.error(
        { jobId: job.id, status: job.status, error: errorMessage(error) },
        'Unexpected error while processing transfer'
      );
      if (canTransition(job.status, 'failed')) {
        this.finishFailed(job, new TransferFailure(errorMessage(error), 'internal', { cause: error }));
      }
    } finally {
      this.throttler.release(job.statusHandle);
      this.activeJob = null;
      await disposePayload(job.payload, this.log);
    }
  }

  private async pumpProgress(job: TransferJob, channel: ProgressChannel): Promise<void> {
    for await (const fraction of channel) {
      if (!this.throttler.shouldEmit(job.statusHandle)) {
        continue;
      }
      this.notifier.notify({
        jobId: job.id,
        statusHandle: job.statusHandle,
        status: job.status,
        kind: 'progress',
        text: progressText(job.fileName, fraction),
        progress: fraction,
      });
    }
  }

  // ===== Transitions =====

  private advance(job: TransferJob, to: 'downloading' | 'uploading', text: string): void {
    job.transition(to);
    this.log.debug({ jobId: job.id, status: to }, 'Transfer advanced');
    this.notifier.notify({
      jobId: job.id,
      statusHandle: job.statusHandle,
      status: to,
      kind: 'status',
      text,
    });
  }

  private applyOutcome(job: TransferJob, outcome: TransferOutcome): void {
    switch (outcome.kind) {
      case 'completed':
        job.transition('completed', { destinationId: outcome.destinationId });
        this.log.info(
          { jobId: job.id, fileName: job.fileName, destinationId: outcome.destinationId },
          'Transfer completed'
        );
        this.notifyTerminal(job, completedText(job.fileName, outcome.destinationId));
        return;
      case 'cancelled':
        this.finishCancelled(job);
        return;
      case 'failed':
        this.finishFailed(job, outcome.error);
        return;
    }
  }

  private finishCancelled(job: TransferJob): void {
    job.transition('cancelled', {
      error: { code: 'cancelled', message: 'Force-stopped by an admin' },
    });
    this.log.info({ jobId: job.id }, 'Transfer cancelled');
    this.notifyTerminal(job, FORCE_STOPPED_TEXT);
  }

  private finishFailed(job: TransferJob, error: TransferError): void {
    job.transition('failed', { error: { code: error.kind, message: error.message } });
    this.log.warn({ jobId: job.id, kind: error.kind, error: error.message }, 'Transfer failed');
    this.notifyTerminal(
      job,
      error instanceof TransferAuthError
        ? authFailedText(error.message, error.remediation)
        : failedText(error.message)
    );
  }

  private notifyTerminal(job: TransferJob, text: string): void {
    this.notifier.notify({
      jobId: job.id,
      statusHandle: job.statusHandle,
      status: job.status,
      kind: 'status',
      text,
    });
  }
}
