import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { AppConfig } from '../../../config/configuration';
import {
  EmptyQueueError,
  JobNotFoundError,
  QueueStorePort,
  RetryLaterError,
  SCAN_START_CURSOR,
  ScanPage,
  jobKey,
} from '../../../application/ports/output/queue-store.port';
import { DownloadJob } from '../../../domain/entities/download-job.entity';
import { JobState } from '../../../domain/value-objects/job-state.vo';
import {
  DynamoDbService,
  JobItem,
  TableKey,
} from '../../../shared/aws/dynamodb/dynamodb.service';
import { SqsService } from '../../../shared/aws/sqs/sqs.service';
import { SqsMessageEnvelope } from '../../../shared/aws/interfaces/sqs-message.interface';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

const THROTTLING_ERRORS: ReadonlySet<string> = new Set([
  'ThrottlingException',
  'RequestThrottled',
  'OverLimit',
  'ProvisionedThroughputExceededException',
]);

const QueueMessageSchema = z.object({ jobId: z.string().min(1) });

const JobItemSchema = z.object({
  id: z.string().min(1),
  aggrId: z.string(),
  url: z.string(),
  callbackUrl: z.string(),
  extra: z.string().default(''),
  downloadTimeout: z.number().int().positive().optional(),
  downloadState: z.nativeEnum(JobState),
  downloadMeta: z.string().default(''),
  callbackState: z.nativeEnum(JobState),
  callbackMeta: z.string().default(''),
  callbackCount: z.number().int().nonnegative(),
});

const CursorSchema = z.record(z.string());

type QueueName = 'pending-downloads' | 'pending-callbacks';

/**
 * A stored item that no longer decodes into a job. Retrying cannot fix it.
 */
export class CorruptRecordError extends Error {
  constructor(
    public readonly jobId: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(`Corrupt record for job ${jobId}: ${issues.join('; ')}`);
    this.name = 'CorruptRecordError';
  }
}

/**
 * DynamoDB + SQS Queue Store Adapter
 * Implements QueueStorePort: job records live in DynamoDB, the two queues are SQS
 * queues carrying `{ "jobId": "<id>" }`.
 *
 * A received message is deleted only after its record has been read, so a crash
 * in between leaves the message to reappear once its visibility timeout lapses.
 */
@Injectable()
export class DynamoDbSqsQueueStoreAdapter implements QueueStorePort {
  private readonly queueUrls: Record<QueueName, string>;

  constructor(
    private readonly dynamoDb: DynamoDbService,
    private readonly sqs: SqsService,
    private readonly configService: ConfigService<AppConfig>,
    private readonly logger: PinoLoggerService,
  ) {
    const sqsConfig = this.configService.getOrThrow('sqs', { infer: true });
    this.queueUrls = {
      'pending-downloads': sqsConfig.pendingDownloadsUrl,
      'pending-callbacks': sqsConfig.pendingCallbacksUrl,
    };
    this.logger.setContext(DynamoDbSqsQueueStoreAdapter.name);
  }

  popCallback(): Promise<DownloadJob> {
    return this.pop('pending-callbacks');
  }

  queuePendingCallback(job: DownloadJob): Promise<void> {
    return this.enqueue('pending-callbacks', job);
  }

  popDownload(): Promise<DownloadJob> {
    return this.pop('pending-downloads');
  }

  queuePendingDownload(job: DownloadJob): Promise<void> {
    return this.enqueue('pending-downloads', job);
  }

  async saveJob(job: DownloadJob): Promise<void> {
    await this.dynamoDb.putJobItem(this.toItem(job));
  }

  async getJob(jobId: string): Promise<DownloadJob> {
    const job = await this.findJob(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  async removeJob(jobId: string): Promise<void> {
    await this.dynamoDb.deleteJobItem(jobKey(jobId));
  }

  async scanKeys(cursor: string, prefix: string, batchSize: number): Promise<ScanPage> {
    const page = await this.dynamoDb.scanJobKeys(
      prefix,
      batchSize,
      this.decodeCursor(cursor),
    );

    return {
      keys: page.keys,
      cursor: page.lastEvaluatedKey
        ? this.encodeCursor(page.lastEvaluatedKey)
        : SCAN_START_CURSOR,
    };
  }

  private async pop(queue: QueueName): Promise<DownloadJob> {
    const queueUrl = this.queueUrls[queue];

    let envelopes: SqsMessageEnvelope[];
    try {
      envelopes = await this.sqs.receiveMessages(queueUrl, 1);
    } catch (error) {
      if (error instanceof Error && THROTTLING_ERRORS.has(error.name)) {
        throw new RetryLaterError(`Queue ${queue} is throttled: ${error.message}`);
      }
      throw error;
    }

    const envelope = envelopes[0];
    if (!envelope) {
      throw new EmptyQueueError(queue);
    }

    const jobId = this.decodeMessage(envelope.body);
    if (jobId === null) {
      await this.sqs.deleteMessage(queueUrl, envelope.receiptHandle);
      throw new Error(`Discarded malformed message ${envelope.messageId} from ${queue}`);
    }

    let job: DownloadJob | null;
    try {
      job = await this.findJob(jobId);
    } catch (error) {
      if (error instanceof CorruptRecordError) {
        await this.sqs.deleteMessage(queueUrl, envelope.receiptHandle);
        this.logger.error(
          {
            jobId,
            queue,
            receiveCount: envelope.approximateReceiveCount,
            issues: error.issues,
          },
          'Queued job has a corrupt record, message dropped',
        );
      }
      throw error;
    }
    const deleted = await this.sqs.deleteMessage(queueUrl, envelope.receiptHandle);

    if (!job) {
      this.logger.warn({ jobId, queue }, 'Queued job has no record, message dropped');
      throw new JobNotFoundError(jobId);
    }
    if (!deleted.success) {
      throw new RetryLaterError(
        `Could not release message for job ${jobId}: ${deleted.error?.message ?? 'unknown error'}`,
      );
    }

    return job;
  }

  private async enqueue(queue: QueueName, job: DownloadJob): Promise<void> {
    const result = await this.sqs.sendMessage(this.queueUrls[queue], { jobId: job.id });
    this.logger.debug({ jobId: job.id, queue, messageId: result.messageId }, 'Job enqueued');
  }

  private async findJob(jobId: string): Promise<DownloadJob | null> {
    const item = await this.dynamoDb.getJobItem(jobKey(jobId));
    if (!item) {
      return null;
    }

    const result = JobItemSchema.safeParse(item);
    if (!result.success) {
      throw new CorruptRecordError(
        jobId,
        result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      );
    }

    try {
      return DownloadJob.create(result.data);
    } catch (error) {
      throw new CorruptRecordError(jobId, [error instanceof Error ? error.message : String(error)]);
    }
  }

  private decodeMessage(body: string): string | null {
    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      return null;
    }
    const result = QueueMessageSchema.safeParse(data);
    return result.success ? result.data.jobId : null;
  }

  private toItem(job: DownloadJob): JobItem {
    return {
      jobKey: jobKey(job.id),
      id: job.id,
      aggrId: job.aggrId,
      url: job.url,
      callbackUrl: job.callbackUrl,
      extra: job.extra,
      downloadTimeout: job.downloadTimeout,
      downloadState: job.downloadState,
      downloadMeta: job.downloadMeta,
      callbackState: job.callbackState,
      callbackMeta: job.callbackMeta,
      callbackCount: job.callbackCount,
    };
  }

  private encodeCursor(lastEvaluatedKey: Record<string, unknown>): string {
    return Buffer.from(JSON.stringify(lastEvaluatedKey)).toString('base64url');
  }

  private decodeCursor(cursor: string): TableKey | undefined {
    if (cursor === SCAN_START_CURSOR) {
      return undefined;
    }

    let data: unknown;
    try {
      data = JSON.parse(Buffer.from(cursor, 'base64url').toString('utf8'));
    } catch {
      throw new Error(`Invalid scan cursor '${cursor}'`);
    }
    const result = CursorSchema.safeParse(data);
    if (!result.success) {
      throw new Error(`Invalid scan cursor '${cursor}'`);
    }
    return result.data;
  }
}
