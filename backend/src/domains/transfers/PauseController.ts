/**
 * PauseController
 *
 * Operator pause/resume. `pause()` runs in a single synchronous step: set the
 * flag, drain and cancel every queued job, then signal the running job. No
 * submission can be admitted in between.
 *
 * @module domains/transfers/PauseController
 */

import type { Logger } from 'pino';
import type { PauseResult, ResumeResult } from '@blob-relay/shared';
import { createChildLogger } from '@/shared/utils/logger';
import type { AdmissionQueue } from './AdmissionQueue';
import type { PauseState } from './PauseState';
import { disposePayload } from './payloads';
import { DRAINED_BY_PAUSE_TEXT } from './status-messages';
import type { StatusNotifier } from './StatusNotifier';
import type { TransferWorker } from './TransferWorker';

export interface PauseControllerDependencies {
  pauseState: PauseState;
  queue: AdmissionQueue;
  worker: Pick<TransferWorker, 'cancelActive'>;
  notifier: StatusNotifier;
  logger?: Logger;
}

export class PauseController {
  private readonly pauseState: PauseState;
  private readonly queue: AdmissionQueue;
  private readonly worker: Pick<TransferWorker, 'cancelActive'>;
  private readonly notifier: StatusNotifier;
  private readonly log: Logger;

  /** Payload disposals started by drains and not yet settled */
  private readonly disposals = new Set<Promise<void>>();

  constructor(deps: PauseControllerDependencies) {
    this.pauseState = deps.pauseState;
    this.queue = deps.queue;
    this.worker = deps.worker;
    this.notifier = deps.notifier;
    this.log = deps.logger ?? createChildLogger({ service: 'PauseController' });
  }

  pause(): PauseResult {
    const wasPaused = !this.pauseState.pause();

    const drained = this.queue.dequeueAll();
    for (const job of drained) {
      job.transition('cancelled', {
        error: { code: 'cancelled', message: 'Relay paused by an admin' },
      });
      this.notifier.notify({
        jobId: job.id,
        statusHandle: job.statusHandle,
        status: job.status,
        kind: 'status',
        text: DRAINED_BY_PAUSE_TEXT,
      });
      this.track(disposePayload(job.payload, this.log));
    }

    const activeJobCancelled = this.worker.cancelActive('Relay paused by an admin');

    this.log.info(
      { drainedCount: drained.length, activeJobCancelled, wasPaused },
      'Relay paused'
    );

    return { drainedCount: drained.length, activeJobCancelled };
  }

  resume(): ResumeResult {
    const resumed = this.pauseState.resume();
    this.log.info({ resumed }, resumed ? 'Relay resumed' : 'Resume requested while not paused');
    return { resumed };
  }

  isPaused(): boolean {
    return this.pauseState.isPaused();
  }

  /**
   * Resolves once every drained payload has been disposed
   */
  async whenSettled(): Promise<void> {
    await Promise.all([...this.disposals]);
  }

  private track(disposal: Promise<void>): void {
    this.disposals.add(disposal);
    void disposal.then(() => this.disposals.delete(disposal));
  }
}
