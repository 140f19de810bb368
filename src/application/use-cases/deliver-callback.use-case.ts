import { Inject, Injectable } from '@nestjs/common';
import {
  DeliverCallbackCommand,
  DeliverCallbackPort,
  DeliverCallbackResult,
} from '../ports/input';
import { CallbackClientPort, EventPublisherPort, QueueStorePort } from '../ports/output';
import {
  CALLBACK_CLIENT_PORT,
  EVENT_PUBLISHER_PORT,
  QUEUE_STORE_PORT,
} from '../ports/tokens';
import {
  CallbackDeliveredEvent,
  CallbackFailedEvent,
  CallbackFailedEventPayload,
  DownloadJob,
} from '../../domain';
import { NOTIFIER_SETTINGS, NotifierSettings } from '../../config/notifier-settings';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

type AttemptResult =
  | { accepted: true; statusCode: number }
  | { accepted: false; reason: string };

/**
 * Deliver Callback Use Case
 *
 * One delivery attempt:
 * 1. count the attempt and persist CallbackState = InProgress
 * 2. check the download has concluded
 * 3. POST the payload to the client
 * 4. remove the record on a 2xx, otherwise re-queue or give up once the
 *    attempt ceiling is reached
 *
 * A job claimed in step 1 and never finished (process crash) is picked up again
 * by the startup recovery scan.
 */
@Injectable()
export class DeliverCallbackUseCase implements DeliverCallbackPort {
  constructor(
    @Inject(QUEUE_STORE_PORT) private readonly store: QueueStorePort,
    @Inject(CALLBACK_CLIENT_PORT) private readonly callbackClient: CallbackClientPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    @Inject(NOTIFIER_SETTINGS) private readonly settings: NotifierSettings,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(DeliverCallbackUseCase.name);
  }

  async execute(command: DeliverCallbackCommand): Promise<DeliverCallbackResult> {
    let job = DownloadJob.incrementCallbackCount(command.job);
    job = DownloadJob.markCallbackInProgress(job);
    await this.store.saveJob(job);

    if (!DownloadJob.isEligibleForCallback(job)) {
      return this.retryOrFail(
        job,
        `Invalid job download state: '${job.downloadState}'`,
        'download_not_concluded',
      );
    }

    const result = await this.attemptDelivery(job);

    if (!result.accepted) {
      return this.retryOrFail(job, result.reason, 'attempts_exhausted');
    }

    await this.store.removeJob(job.id);

    this.logger.info(
      { jobId: job.id, aggrId: job.aggrId, attempts: job.callbackCount },
      'Callback delivered',
    );
    this.eventPublisher.publishAsync(
      new CallbackDeliveredEvent({
        jobId: job.id,
        aggrId: job.aggrId,
        callbackUrl: job.callbackUrl,
        attempts: job.callbackCount,
        statusCode: result.statusCode,
      }),
    );

    return { job, outcome: 'delivered' };
  }

  private async attemptDelivery(job: DownloadJob): Promise<AttemptResult> {
    const payload = DownloadJob.toCallbackPayload(job, this.settings.downloadUrl);

    try {
      const response = await this.callbackClient.post(job.callbackUrl, payload);
      if (response.statusCode >= 200 && response.statusCode < 300) {
        return { accepted: true, statusCode: response.statusCode };
      }
      return { accepted: false, reason: `Received status: ${response.statusCode}` };
    } catch (error) {
      return {
        accepted: false,
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private async retryOrFail(
    job: DownloadJob,
    reason: string,
    failureReason: CallbackFailedEventPayload['failureReason'],
  ): Promise<DeliverCallbackResult> {
    if (job.callbackCount >= this.settings.maxCallbackAttempts) {
      const failed = DownloadJob.markCallbackFailed(job, reason);

      this.logger.warn(
        {
          jobId: failed.id,
          aggrId: failed.aggrId,
          callbackUrl: failed.callbackUrl,
          attempts: failed.callbackCount,
          reason,
        },
        'Callback failed',
      );
      await this.store.saveJob(failed);

      this.eventPublisher.publishAsync(
        new CallbackFailedEvent({
          jobId: failed.id,
          aggrId: failed.aggrId,
          callbackUrl: failed.callbackUrl,
          attempts: failed.callbackCount,
          reason,
          failureReason,
        }),
      );

      return { job: failed, outcome: 'failed' };
    }

    const pending = DownloadJob.markCallbackPending(job, reason);
    await this.store.saveJob(pending);
    await this.store.queuePendingCallback(pending);

    this.logger.info(
      { jobId: pending.id, attempts: pending.callbackCount, reason },
      'Callback attempt failed, re-queued',
    );

    return { job: pending, outcome: 'retrying' };
  }
}
