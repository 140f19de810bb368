import { DownloadJob } from '../../../domain/entities/download-job.entity';

/** Prefix of every job-record key in the store. */
export const JOB_KEY_PREFIX = 'job:';

/** Cursor that starts a key scan, and that the store hands back once the scan is done. */
export const SCAN_START_CURSOR = '0';

export function jobKey(jobId: string): string {
  return `${JOB_KEY_PREFIX}${jobId}`;
}

export function jobIdFromKey(key: string): string {
  return key.startsWith(JOB_KEY_PREFIX) ? key.slice(JOB_KEY_PREFIX.length) : key;
}

/**
 * No work is queued right now. A signal, not a failure.
 */
export class EmptyQueueError extends Error {
  constructor(queue: string) {
    super(`Queue ${queue} is empty`);
    this.name = 'EmptyQueueError';
  }
}

/**
 * The queue exists but cannot hand out an item right now (throttled, leased).
 * Callers should back off and try again.
 */
export class RetryLaterError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'RetryLaterError';
  }
}

export class JobNotFoundError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job ${jobId} not found`);
    this.name = 'JobNotFoundError';
  }
}

export interface ScanPage {
  keys: string[];
  /** SCAN_START_CURSOR once the key space has been walked. */
  cursor: string;
}

/**
 * Durable Queue Store Port (Driven Port)
 *
 * A keyed job-record table plus two queues: pending downloads (consumed by the
 * processor) and pending callbacks (consumed by the notifier).
 *
 * Implementations must hand out a queued item to at most one consumer per
 * enqueue, and writes to a single record must be linearizable. Enqueueing never
 * modifies the stored record.
 */
export interface QueueStorePort {
  /**
   * Remove and return one job awaiting callback delivery.
   * Rejects with EmptyQueueError or RetryLaterError when no job can be handed out.
   */
  popCallback(): Promise<DownloadJob>;

  /**
   * Enqueue a job for (another) callback delivery
   */
  queuePendingCallback(job: DownloadJob): Promise<void>;

  /**
   * Remove and return one job awaiting download
   */
  popDownload(): Promise<DownloadJob>;

  /**
   * Enqueue a freshly submitted job for download
   */
  queuePendingDownload(job: DownloadJob): Promise<void>;

  /**
   * Persist the full current state of a job (idempotent overwrite)
   */
  saveJob(job: DownloadJob): Promise<void>;

  /**
   * Fetch a job by ID. Rejects with JobNotFoundError when absent.
   */
  getJob(jobId: string): Promise<DownloadJob>;

  /**
   * Delete a job record entirely
   */
  removeJob(jobId: string): Promise<void>;

  /**
   * Resumable enumeration of record keys starting with `prefix`.
   * Tolerates concurrent writes; a key may be returned more than once.
   */
  scanKeys(cursor: string, prefix: string, batchSize: number): Promise<ScanPage>;
}
