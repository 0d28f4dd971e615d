/**
 * TransferCoordinator
 *
 * Entry point of the transfers domain. Wires the admission queue, the
 * worker loop and the pause controller around one shared PauseState, and
 * exposes submit / pause / resume / lookups to the HTTP layer.
 *
 * Usage:
 * ```typescript
 * const coordinator = getTransferCoordinator({ backend, channel });
 * const result = coordinator.submit({ payload, requesterId, statusHandle });
 * ```
 *
 * @module domains/transfers/TransferCoordinator
 */

import type { Logger } from 'pino';
import type {
  PauseResult,
  RelayStatus,
  ResumeResult,
  SubmitTransferResult,
  TransferJobSnapshot,
} from '@blob-relay/shared';
import { createChildLogger } from '@/shared/utils/logger';
import { AdmissionQueue } from './AdmissionQueue';
import type { ITransferBackend } from './ITransferBackend';
import { PauseController } from './PauseController';
import { PauseState } from './PauseState';
import type { TransferPayload } from './payloads';
import { ProgressThrottler } from './ProgressThrottler';
import { QueuePositionReporter } from './QueuePositionReporter';
import { PAUSED_SUBMISSION_MESSAGE, queuedText } from './status-messages';
import { StatusNotifier, type IStatusChannel } from './StatusNotifier';
import { TransferJob } from './TransferJob';
import { TransferJobRegistry } from './TransferJobRegistry';
import { TransferWorker } from './TransferWorker';

export interface TransferCoordinatorDependencies {
  backend: ITransferBackend;
  channel: IStatusChannel;
  progressIntervalMs?: number;
  historyLimit?: number;
  /** Millisecond clock for progress throttling */
  clock?: () => number;
  logger?: Logger;
}

export interface SubmitTransferInput {
  payload: TransferPayload;
  requesterId: string;
  statusHandle: string;
}

export class TransferCoordinator {
  private static instance: TransferCoordinator | null = null;

  private readonly log: Logger;
  private readonly pauseState = new PauseState();
  private readonly queue = new AdmissionQueue();
  private readonly registry: TransferJobRegistry;
  private readonly notifier: StatusNotifier;
  private readonly positions: QueuePositionReporter;
  private readonly worker: TransferWorker;
  private readonly pauseController: PauseController;

  constructor(deps: TransferCoordinatorDependencies) {
    this.log = deps.logger ?? createChildLogger({ service: 'TransferCoordinator' });
    this.registry = new TransferJobRegistry(deps.historyLimit);
    this.notifier = new StatusNotifier({ channel: deps.channel });
    this.positions = new QueuePositionReporter(this.queue, this.notifier);
    this.worker = new TransferWorker({
      queue: this.queue,
      pauseState: this.pauseState,
      backend: deps.backend,
      notifier: this.notifier,
      positions: this.positions,
      throttler: new ProgressThrottler({ intervalMs: deps.progressIntervalMs, now: deps.clock }),
    });
    this.pauseController = new PauseController({
      pauseState: this.pauseState,
      queue: this.queue,
      worker: this.worker,
      notifier: this.notifier,
    });
  }

  /**
   * Get the process-wide coordinator, creating it on first call
   *
   * @throws Error when called for the first time without dependencies
   */
  public static getInstance(deps?: TransferCoordinatorDependencies): TransferCoordinator {
    if (!TransferCoordinator.instance) {
      if (!deps) {
        throw new Error(
          'TransferCoordinator not initialized. Call getTransferCoordinator(deps) during server startup.'
        );
      }
      TransferCoordinator.instance = new TransferCoordinator(deps);
    }
    return TransferCoordinator.instance;
  }

  public static resetInstance(): void {
    TransferCoordinator.instance = null;
  }

  // ===== Submission =====

  submit(input: SubmitTransferInput): SubmitTransferResult {
    if (this.pauseState.isPaused()) {
      this.log.info({ requesterId: input.requesterId }, 'Submission rejected: relay paused');
      return { accepted: false, reason: 'paused', message: PAUSED_SUBMISSION_MESSAGE };
    }

    const job = new TransferJob(input);
    this.registry.register(job);

    this.notifier.notify({
      jobId: job.id,
      statusHandle: job.statusHandle,
      status: job.status,
      kind: 'status',
      text: queuedText(),
    });

    this.queue.enqueue(job);
    if (!this.worker.activate()) {
      this.positions.publish();
    }

    const position = this.queue.positionOf(job.id) ?? 0;
    this.log.info(
      { jobId: job.id, fileName: job.fileName, requesterId: job.requesterId, position },
      'Transfer accepted'
    );

    return { accepted: true, jobId: job.id, position };
  }

  // ===== Operator controls =====

  pause(): PauseResult {
    return this.pauseController.pause();
  }

  resume(): ResumeResult {
    return this.pauseController.resume();
  }

  isPaused(): boolean {
    return this.pauseState.isPaused();
  }

  // ===== Introspection =====

  positionOf(jobId: string): number | null {
    return this.queue.positionOf(jobId);
  }

  getJob(jobId: string): TransferJobSnapshot | null {
    const job = this.registry.get(jobId);
    return job ? job.toSnapshot(this.queue.positionOf(jobId)) : null;
  }

  getStatus(): RelayStatus {
    const active = this.worker.getActiveJob();
    return {
      paused: this.pauseState.isPaused(),
      queued: this.queue.size(),
      active: active ? active.toSnapshot() : null,
    };
  }

  // ===== Lifecycle =====

  /**
   * Resolves once the worker is idle and every status update has been attempted
   */
  async whenIdle(): Promise<void> {
    await this.worker.whenIdle();
    await this.pauseController.whenSettled();
    await this.notifier.flush();
  }

  /**
   * Pause the relay and wait for in-flight work to wind down
   */
  async shutdown(): Promise<PauseResult> {
    const result = this.pause();
    await this.whenIdle();
    this.log.info(result, 'Transfer coordinator stopped');
    return result;
  }
}

export function getTransferCoordinator(deps?: TransferCoordinatorDependencies): TransferCoordinator {
  return TransferCoordinator.getInstance(deps);
}

export function __resetTransferCoordinator(): void {
  TransferCoordinator.resetInstance();
}
