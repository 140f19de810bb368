/**
 * Application Configuration Module
 *
 * Loads and validates environment variables, providing type-safe access
 * to all configuration values throughout the application.
 *
 * ## Configuration Sources:
 * 1. Environment variables (`.env` file or system environment)
 * 2. Validated by Zod schema in `validation.schema.ts`
 * 3. Transformed into typed AppConfig object
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const notifier = this.configService.getOrThrow('notifier', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';

/**
 * Application configuration interface.
 *
 * Organized by concern (aws, sqs, dynamodb, notifier).
 */
export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  aws: {
    region: string;
    endpoint?: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
  sqs: {
    pendingDownloadsUrl: string;
    pendingCallbacksUrl: string;
    waitTimeSeconds: number;
    visibilityTimeout: number;
  };
  dynamodb: {
    tableName: string;
  };
  /**
   * Callback notifier configuration.
   *
   * ### concurrency (NOTIFIER_CONCURRENCY)
   * Number of callbacks delivered in parallel. The dispatcher never pops more
   * jobs than there are idle workers.
   *
   * ### downloadUrl (NOTIFIER_DOWNLOAD_URL)
   * Absolute base URL handed to clients; the job ID is appended as the last
   * path segment, e.g. `https://dl.example.com/files/<jobId>`.
   *
   * ### callbackTimeoutMs (NOTIFIER_CALLBACK_TIMEOUT_MS)
   * Hard deadline for a single callback POST, independent of any per-job
   * download timeout.
   *
   * ### maxCallbackAttempts (NOTIFIER_MAX_CALLBACK_ATTEMPTS)
   * Delivery attempts per job before the callback is marked Failed.
   *
   * ### backoffMs (NOTIFIER_BACKOFF_MS)
   * Pause after an empty queue or a store error.
   *
   * ### scanBatchSize (NOTIFIER_SCAN_BATCH_SIZE)
   * Keys fetched per round-trip by the startup recovery scan.
   */
  notifier: {
    concurrency: number;
    downloadUrl: string;
    callbackTimeoutMs: number;
    maxCallbackAttempts: number;
    backoffMs: number;
    scanBatchSize: number;
  };
}

export default (): AppConfig => {
  const env: EnvConfig = validateEnv(process.env);

  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    aws: {
      region: env.AWS_REGION,
      endpoint: env.AWS_ENDPOINT,
    },
    sqs: {
      pendingDownloadsUrl: env.SQS_PENDING_DOWNLOADS_URL,
      pendingCallbacksUrl: env.SQS_PENDING_CALLBACKS_URL,
      waitTimeSeconds: env.SQS_WAIT_TIME_SECONDS,
      visibilityTimeout: env.SQS_VISIBILITY_TIMEOUT,
    },
    dynamodb: {
      tableName: env.DYNAMODB_TABLE_NAME,
    },
    notifier: {
      concurrency: env.NOTIFIER_CONCURRENCY,
      downloadUrl: env.NOTIFIER_DOWNLOAD_URL,
      callbackTimeoutMs: env.NOTIFIER_CALLBACK_TIMEOUT_MS,
      maxCallbackAttempts: env.NOTIFIER_MAX_CALLBACK_ATTEMPTS,
      backoffMs: env.NOTIFIER_BACKOFF_MS,
      scanBatchSize: env.NOTIFIER_SCAN_BATCH_SIZE,
    },
  };

  // Add AWS credentials only if explicitly provided
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.aws.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    };
  }

  return config;
};
