import { Inject, Injectable } from '@nestjs/common';
import {
  RecoverCallbacksPort,
  RecoverCallbacksResult,
} from '../ports/input/recover-callbacks.port';
import {
  JOB_KEY_PREFIX,
  JobNotFoundError,
  QueueStorePort,
  SCAN_START_CURSOR,
  ScanPage,
  jobIdFromKey,
} from '../ports/output/queue-store.port';
import { QUEUE_STORE_PORT } from '../ports/tokens';
import { JobState } from '../../domain/value-objects/job-state.vo';
import { NOTIFIER_SETTINGS, NotifierSettings } from '../../config/notifier-settings';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

/**
 * Recover Callbacks Use Case
 *
 * A live notifier always moves a callback out of InProgress, so an InProgress
 * record seen before dispatch starts belongs to a delivery interrupted by a
 * crash. Each one is put back on the pending-callback queue; the record itself
 * is left as is.
 */
@Injectable()
export class RecoverCallbacksUseCase implements RecoverCallbacksPort {
  constructor(
    @Inject(QUEUE_STORE_PORT) private readonly store: QueueStorePort,
    @Inject(NOTIFIER_SETTINGS) private readonly settings: NotifierSettings,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(RecoverCallbacksUseCase.name);
  }

  async execute(): Promise<RecoverCallbacksResult> {
    const seen = new Set<string>();
    let cursor = SCAN_START_CURSOR;
    let recovered = 0;

    do {
      let page: ScanPage;
      try {
        page = await this.store.scanKeys(cursor, JOB_KEY_PREFIX, this.settings.scanBatchSize);
      } catch (error) {
        this.logger.error(
          { cursor, error: error instanceof Error ? error.message : String(error) },
          'Recovery scan aborted',
        );
        break;
      }

      for (const key of page.keys) {
        const jobId = jobIdFromKey(key);
        // Scans may repeat keys across pages
        if (seen.has(jobId)) continue;
        seen.add(jobId);

        if (await this.requeueIfInProgress(jobId)) {
          recovered++;
        }
      }

      cursor = page.cursor;
    } while (cursor !== SCAN_START_CURSOR);

    this.logger.info({ scanned: seen.size, recovered }, 'Queued rogue callbacks');

    return { scanned: seen.size, recovered };
  }

  private async requeueIfInProgress(jobId: string): Promise<boolean> {
    try {
      const job = await this.store.getJob(jobId);
      if (job.callbackState !== JobState.IN_PROGRESS) {
        return false;
      }

      await this.store.queuePendingCallback(job);
      this.logger.debug({ jobId, attempts: job.callbackCount }, 'Re-queued rogue callback');
      return true;
    } catch (error) {
      if (error instanceof JobNotFoundError) {
        // Removed between the scan and the read
        return false;
      }
      this.logger.error(
        { jobId, error: error instanceof Error ? error.message : String(error) },
        'Could not recover callback',
      );
      return false;
    }
  }
}
