import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { EventEmitter } from 'events';
import { DownloadJob } from '../domain/entities/download-job.entity';
import {
  DeliverCallbackPort,
  DeliveryOutcome,
} from '../application/ports/input/deliver-callback.port';
import { DELIVER_CALLBACK_PORT } from '../application/ports/tokens';
import { NOTIFIER_SETTINGS, NotifierSettings } from '../config/notifier-settings';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import {
  PoolStats,
  TaskCompletedEvent,
  TaskFailedEvent,
  WorkerStats,
} from './interfaces/pool-stats.interface';

/**
 * Bookkeeping for one worker loop.
 */
interface WorkerWrapper {
  workerId: number;
  isActive: boolean;
  currentJobId?: string;
  tasksCompleted: number;
  tasksFailed: number;
  lastActivityAt: Date;
}

/**
 * A job offered by `submit` that no worker has taken yet.
 */
interface PendingOffer {
  job: DownloadJob;
  settle: (taken: boolean) => void;
}

type Taker = (job: DownloadJob | null) => void;

/**
 * Worker Pool Manager Service
 *
 * Runs a fixed number of async worker loops inside the process, each taking one
 * job at a time and running callback delivery to completion before taking the
 * next.
 *
 * ## Handoff
 *
 * There is no task queue. `submit()` settles only once a worker has actually
 * taken the job, so a caller that submits in a loop can never get ahead of the
 * workers. A submission can be withdrawn through its AbortSignal while it waits.
 *
 * ## Shutdown
 *
 * `shutdown()` closes the handoff: waiting submissions settle with `false`,
 * idle workers exit, and busy workers exit after their current delivery. The
 * returned promise settles once every loop has exited.
 *
 * ## Events
 *
 * - `taskCompleted` (TaskCompletedEvent): delivery ran to an outcome
 * - `taskFailed` (TaskFailedEvent): delivery threw, typically a store error
 */
@Injectable()
export class PoolManagerService
  extends EventEmitter
  implements OnModuleInit, OnModuleDestroy
{
  private workers: Map<number, WorkerWrapper> = new Map();
  private workerLoops: Promise<void>[] = [];

  /** Workers parked in `take()`, first in first served. */
  private idleTakers: Taker[] = [];
  private offers: PendingOffer[] = [];

  private isShuttingDown = false;
  private shutdownPromise?: Promise<void>;

  private readonly poolSize: number;

  private completedTasksCount = 0;
  private failedTasksCount = 0;
  private totalProcessingTimeMs = 0;
  private readonly outcomes: Record<DeliveryOutcome, number> = {
    delivered: 0,
    retrying: 0,
    failed: 0,
  };

  constructor(
    @Inject(NOTIFIER_SETTINGS) settings: NotifierSettings,
    @Inject(DELIVER_CALLBACK_PORT) private readonly deliverCallback: DeliverCallbackPort,
    private readonly logger: PinoLoggerService,
  ) {
    super();
    this.poolSize = settings.concurrency;
    this.logger.setContext(PoolManagerService.name);
  }

  onModuleInit(): void {
    this.start();
  }

  async onModuleDestroy(): Promise<void> {
    await this.shutdown();
  }

  /**
   * Spawns the worker loops. Calling it again is a no-op.
   */
  start(): void {
    if (this.workerLoops.length > 0 || this.isShuttingDown) return;

    for (let workerId = 0; workerId < this.poolSize; workerId++) {
      const wrapper: WorkerWrapper = {
        workerId,
        isActive: false,
        tasksCompleted: 0,
        tasksFailed: 0,
        lastActivityAt: new Date(),
      };
      this.workers.set(workerId, wrapper);
      this.workerLoops.push(this.runWorker(wrapper));
    }

    this.logger.info({ poolSize: this.poolSize }, 'Worker pool started');
  }

  /**
   * Hand a job to the next free worker.
   *
   * @returns true once a worker took the job; false if the signal fired or the
   * pool closed first, in which case the job is still the caller's
   */
  submit(job: DownloadJob, signal?: AbortSignal): Promise<boolean> {
    if (this.isShuttingDown || signal?.aborted) {
      return Promise.resolve(false);
    }

    const taker = this.idleTakers.shift();
    if (taker) {
      taker(job);
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const onAbort = () => {
        this.offers = this.offers.filter((pending) => pending !== offer);
        offer.settle(false);
      };
      const offer: PendingOffer = {
        job,
        settle: (taken) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(taken);
        },
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.offers.push(offer);
    });
  }

  private take(): Promise<DownloadJob | null> {
    if (this.isShuttingDown) {
      return Promise.resolve(null);
    }

    const offer = this.offers.shift();
    if (offer) {
      offer.settle(true);
      return Promise.resolve(offer.job);
    }

    return new Promise<DownloadJob | null>((resolve) => this.idleTakers.push(resolve));
  }

  private async runWorker(wrapper: WorkerWrapper): Promise<void> {
    for (;;) {
      const job = await this.take();
      if (!job) break;

      wrapper.isActive = true;
      wrapper.currentJobId = job.id;
      wrapper.lastActivityAt = new Date();
      const startedAt = Date.now();

      try {
        const result = await this.deliverCallback.execute({ job });
        const processingTimeMs = Date.now() - startedAt;

        wrapper.tasksCompleted++;
        this.completedTasksCount++;
        this.outcomes[result.outcome]++;
        this.totalProcessingTimeMs += processingTimeMs;

        const event: TaskCompletedEvent = {
          workerId: wrapper.workerId,
          jobId: job.id,
          outcome: result.outcome,
          processingTimeMs,
        };
        this.emit('taskCompleted', event);
      } catch (error) {
        const processingTimeMs = Date.now() - startedAt;
        const message = error instanceof Error ? error.message : String(error);

        wrapper.tasksFailed++;
        this.failedTasksCount++;
        this.totalProcessingTimeMs += processingTimeMs;

        this.logger
          .withJobId(job.id)
          .error({ workerId: wrapper.workerId, error: message }, 'Callback delivery failed');
        const event: TaskFailedEvent = {
          workerId: wrapper.workerId,
          jobId: job.id,
          error: message,
          processingTimeMs,
        };
        this.emit('taskFailed', event);
      } finally {
        wrapper.isActive = false;
        wrapper.currentJobId = undefined;
        wrapper.lastActivityAt = new Date();
      }
    }

    this.logger.debug({ workerId: wrapper.workerId }, 'Worker stopped');
  }

  getIdleWorkerCount(): number {
    let count = 0;
    for (const wrapper of this.workers.values()) {
      if (!wrapper.isActive) count++;
    }
    return count;
  }

  getActiveWorkerCount(): number {
    return this.workers.size - this.getIdleWorkerCount();
  }

  getStats(): PoolStats {
    const totalTasks = this.completedTasksCount + this.failedTasksCount;

    return {
      poolSize: this.poolSize,
      activeWorkers: this.getActiveWorkerCount(),
      idleWorkers: this.getIdleWorkerCount(),
      waitingSubmissions: this.offers.length,
      completedTasks: this.completedTasksCount,
      failedTasks: this.failedTasksCount,
      outcomes: { ...this.outcomes },
      averageProcessingTimeMs: totalTasks > 0 ? this.totalProcessingTimeMs / totalTasks : 0,
      isAccepting: !this.isShuttingDown,
    };
  }

  getWorkerStats(): WorkerStats[] {
    return Array.from(this.workers.values()).map((wrapper) => ({
      workerId: wrapper.workerId,
      isActive: wrapper.isActive,
      currentJobId: wrapper.currentJobId,
      tasksCompleted: wrapper.tasksCompleted,
      tasksFailed: wrapper.tasksFailed,
      lastActivityAt: wrapper.lastActivityAt,
    }));
  }

  /**
   * Close the handoff and wait for in-flight deliveries. Idempotent.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.drain();
    }
    return this.shutdownPromise;
  }

  private async drain(): Promise<void> {
    this.isShuttingDown = true;
    this.logger.info(
      { activeWorkers: this.getActiveWorkerCount() },
      'Shutting down worker pool',
    );

    for (const offer of this.offers) {
      offer.settle(false);
    }
    this.offers = [];

    for (const taker of this.idleTakers) {
      taker(null);
    }
    this.idleTakers = [];

    await Promise.all(this.workerLoops);
    this.logger.info('Worker pool shut down');
  }
}
