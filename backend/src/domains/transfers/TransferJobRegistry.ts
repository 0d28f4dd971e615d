/**
 * TransferJobRegistry
 *
 * Lookup table of jobs by id for status queries. Terminal jobs beyond the
 * history limit are pruned oldest first; live jobs are never pruned.
 *
 * @module domains/transfers/TransferJobRegistry
 */

import { TRANSFER_CONFIG } from '@blob-relay/shared';
import type { TransferJob } from './TransferJob';

export class TransferJobRegistry {
  private readonly jobs = new Map<string, TransferJob>();

  constructor(private readonly historyLimit: number = TRANSFER_CONFIG.HISTORY_LIMIT) {}

  register(job: TransferJob): void {
    this.jobs.set(job.id, job);
    this.prune();
  }

  get(jobId: string): TransferJob | undefined {
    return this.jobs.get(jobId);
  }

  size(): number {
    return this.jobs.size;
  }

  private prune(): void {
    let terminal = 0;
    for (const job of this.jobs.values()) {
      if (job.isTerminal) {
        terminal++;
      }
    }

    // Map iteration is insertion order, so the oldest go first
    for (const [id, job] of this.jobs) {
      if (terminal <= this.historyLimit) {
        return;
      }
      if (job.isTerminal) {
        this.jobs.delete(id);
        terminal--;
      }
    }
  }
}
