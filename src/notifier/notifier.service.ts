import {
  Inject,
  Injectable,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import {
  EmptyQueueError,
  QueueStorePort,
  RetryLaterError,
} from '../application/ports/output/queue-store.port';
import { QUEUE_STORE_PORT } from '../application/ports/tokens';
import { RecoverCallbacksUseCase } from '../application/use-cases/recover-callbacks.use-case';
import { DownloadJob } from '../domain/entities/download-job.entity';
import { NOTIFIER_SETTINGS, NotifierSettings } from '../config/notifier-settings';
import { PoolManagerService } from '../worker-pool/pool-manager.service';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';

/**
 * Notifier Service
 *
 * Owns the single dispatcher of the pending-callback queue. On bootstrap it
 * re-queues callbacks a crashed process left InProgress, then loops:
 * pop a job, hand it to the worker pool, repeat. The handoff blocks while every
 * worker is busy, so the dispatcher never holds more than one job.
 *
 * Shutdown stops popping, returns a held job to the queue, and waits for the
 * pool to finish the deliveries already under way. A pop that is in flight when
 * shutdown starts is allowed to return first (bounded by the queue's long-poll
 * wait).
 */
@Injectable()
export class NotifierService implements OnApplicationBootstrap, OnModuleDestroy {
  private isRunning = false;
  private readonly abortController = new AbortController();
  private runPromise: Promise<void> | null = null;

  constructor(
    @Inject(QUEUE_STORE_PORT) private readonly store: QueueStorePort,
    private readonly pool: PoolManagerService,
    private readonly recoverCallbacks: RecoverCallbacksUseCase,
    @Inject(NOTIFIER_SETTINGS) private readonly settings: NotifierSettings,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(NotifierService.name);
  }

  async onApplicationBootstrap(): Promise<void> {
    await this.start();
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  /**
   * Run the recovery scan, then start dispatching. Resolves once dispatching has
   * started; a stopped notifier cannot be restarted.
   */
  async start(): Promise<void> {
    if (this.isRunning || this.abortController.signal.aborted) {
      return;
    }
    this.isRunning = true;

    this.pool.start();
    await this.recoverCallbacks.execute();

    if (this.abortController.signal.aborted) {
      return;
    }

    this.logger.info(
      { concurrency: this.settings.concurrency, backoffMs: this.settings.backoffMs },
      'Starting callback dispatcher',
    );
    this.runPromise = this.run(this.abortController.signal);
  }

  async stop(): Promise<void> {
    if (this.abortController.signal.aborted) {
      return;
    }

    this.logger.info('Stopping callback dispatcher');
    this.abortController.abort();

    if (this.runPromise) {
      await this.runPromise;
    }
    await this.pool.shutdown();
    this.isRunning = false;

    this.logger.info({ stats: this.pool.getStats() }, 'Callback dispatcher stopped');
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let job: DownloadJob;
      try {
        job = await this.store.popCallback();
      } catch (error) {
        if (error instanceof EmptyQueueError || error instanceof RetryLaterError) {
          this.logger.debug({ reason: error.message }, 'No callback to dispatch');
        } else {
          this.logger.error(
            { error: error instanceof Error ? error.message : String(error) },
            'Failed to pop callback',
          );
        }
        await this.backoff(signal);
        continue;
      }

      const taken = await this.pool.submit(job, signal);
      if (!taken) {
        // Shutting down: the job never reached a worker
        await this.returnToQueue(job);
        break;
      }
    }
  }

  private async returnToQueue(job: DownloadJob): Promise<void> {
    try {
      await this.store.queuePendingCallback(job);
      this.logger.info({ jobId: job.id }, 'Returned undelivered callback to the queue');
    } catch (error) {
      this.logger.error(
        {
          jobId: job.id,
          callbackState: job.callbackState,
          error: error instanceof Error ? error.message : String(error),
        },
        'Could not return callback to the queue',
      );
    }
  }

  private backoff(signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      const done = () => {
        clearTimeout(timer);
        signal.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, this.settings.backoffMs);
      signal.addEventListener('abort', done, { once: true });
    });
  }
}
