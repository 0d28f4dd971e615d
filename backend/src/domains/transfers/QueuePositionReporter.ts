/**
 * QueuePositionReporter
 *
 * Republishes the 1-based position of every queued job. Jobs whose position
 * did not change since their last announcement are skipped.
 *
 * @module domains/transfers/QueuePositionReporter
 */

import type { AdmissionQueue } from './AdmissionQueue';
import type { StatusNotifier } from './StatusNotifier';
import { queuedText } from './status-messages';

export class QueuePositionReporter {
  constructor(
    private readonly queue: AdmissionQueue,
    private readonly notifier: StatusNotifier
  ) {}

  /**
   * @returns number of jobs that were notified
   */
  publish(): number {
    let notified = 0;

    this.queue.snapshot().forEach((job, index) => {
      const position = index + 1;
      if (job.lastAnnouncedPosition === position) {
        return;
      }
      job.lastAnnouncedPosition = position;
      this.notifier.notify({
        jobId: job.id,
        statusHandle: job.statusHandle,
        status: job.status,
        kind: 'position',
        text: queuedText(position),
        position,
      });
      notified++;
    });

    return notified;
  }
}
