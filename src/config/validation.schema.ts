import { z } from 'zod';

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // AWS
  AWS_REGION: z.string().default('us-east-1'),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  AWS_ENDPOINT: z.string().url().optional(), // For LocalStack

  // SQS
  SQS_PENDING_DOWNLOADS_URL: z.string().url(),
  SQS_PENDING_CALLBACKS_URL: z.string().url(),
  SQS_WAIT_TIME_SECONDS: z.coerce.number().int().min(0).max(20).default(5),
  SQS_VISIBILITY_TIMEOUT: z.coerce.number().int().min(0).max(43200).default(60),

  // DynamoDB
  DYNAMODB_TABLE_NAME: z.string().default('download-jobs'),

  // Notifier
  NOTIFIER_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  NOTIFIER_DOWNLOAD_URL: z.string().url(),
  NOTIFIER_CALLBACK_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  NOTIFIER_MAX_CALLBACK_ATTEMPTS: z.coerce.number().int().min(1).default(2),
  NOTIFIER_BACKOFF_MS: z.coerce.number().int().positive().default(1000),
  NOTIFIER_SCAN_BATCH_SIZE: z.coerce.number().int().min(1).max(1000).default(50),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
