import { Inject, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  SubmitJobCommand,
  SubmitJobPort,
  SubmitJobResult,
} from '../ports/input/submit-job.port';
import { QueueStorePort } from '../ports/output/queue-store.port';
import { QUEUE_STORE_PORT } from '../ports/tokens';
import { decodeJobRequest } from '../dto/job-request.dto';
import { DownloadJob } from '../../domain/entities/download-job.entity';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

/**
 * Submit Job Use Case
 * Entry point of the pipeline: a rejected payload never reaches the store
 */
@Injectable()
export class SubmitJobUseCase implements SubmitJobPort {
  constructor(
    @Inject(QUEUE_STORE_PORT) private readonly store: QueueStorePort,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(SubmitJobUseCase.name);
  }

  async execute(command: SubmitJobCommand): Promise<SubmitJobResult> {
    const submission = decodeJobRequest(command.payload);
    const job = DownloadJob.fromSubmission(uuidv4(), submission);

    await this.store.saveJob(job);
    await this.store.queuePendingDownload(job);

    this.logger.info(
      { jobId: job.id, aggrId: job.aggrId, url: job.url },
      'Job queued for download',
    );

    return { job };
  }
}
