/**
 * StatusNotifier
 *
 * Delivers status texts to status handles through an IStatusChannel.
 *
 * - Fire-and-forget: `notify()` never throws and never rejects
 * - Serialized per handle: deliveries to one handle run one after another,
 *   in call order
 * - Every event is stamped from one notifier-wide counter, so sequence
 *   numbers only grow for each handle and no per-handle state outlives its
 *   pending deliveries
 * - Delivery failures are logged at warn and dropped
 *
 * @module domains/transfers/StatusNotifier
 */

import type { Logger } from 'pino';
import type { TransferStatusEvent } from '@blob-relay/shared';
import { createChildLogger } from '@/shared/utils/logger';
import { errorMessage } from './errors';

/**
 * Transport for status events (Socket.IO rooms in production)
 */
export interface IStatusChannel {
  send(statusHandle: string, event: TransferStatusEvent): Promise<void> | void;
}

export type StatusUpdate = Omit<TransferStatusEvent, 'sequence' | 'emittedAt'>;

export interface StatusNotifierDependencies {
  channel: IStatusChannel;
  logger?: Logger;
  now?: () => Date;
}

export class StatusNotifier {
  private readonly channel: IStatusChannel;
  private readonly log: Logger;
  private readonly now: () => Date;

  /** Pending delivery chain per handle; removed once the chain settles */
  private readonly chains = new Map<string, Promise<void>>();
  private lastSequence = 0;

  constructor(deps: StatusNotifierDependencies) {
    this.channel = deps.channel;
    this.log = deps.logger ?? createChildLogger({ service: 'StatusNotifier' });
    this.now = deps.now ?? (() => new Date());
  }

  notify(update: StatusUpdate): void {
    const handle = update.statusHandle;
    const sequence = ++this.lastSequence;

    const event: TransferStatusEvent = {
      ...update,
      sequence,
      emittedAt: this.now().toISOString(),
    };

    const previous = this.chains.get(handle) ?? Promise.resolve();
    const next = previous.then(() => this.deliver(handle, event));
    this.chains.set(handle, next);

    void next.then(() => {
      if (this.chains.get(handle) === next) {
        this.chains.delete(handle);
      }
    });
  }

  /**
   * Resolves once every notification issued so far has been attempted
   */
  async flush(): Promise<void> {
    while (this.chains.size > 0) {
      await Promise.all([...this.chains.values()]);
    }
  }

  get pendingHandles(): number {
    return this.chains.size;
  }

  private async deliver(handle: string, event: TransferStatusEvent): Promise<void> {
    try {
      await this.channel.send(handle, event);
    } catch (error) {
      this.log.warn(
        { statusHandle: handle, jobId: event.jobId, kind: event.kind, error: errorMessage(error) },
        'Status notification failed'
      );
    }
  }
}
