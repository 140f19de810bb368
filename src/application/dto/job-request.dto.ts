import { z } from 'zod';
import { DownloadJob } from '../../domain/entities/download-job.entity';
import { ValidationError } from '../../domain/errors/domain.errors';

const absoluteUri = (field: string) =>
  z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    })
    .min(1, `${field} is required`)
    .url(`${field} must be an absolute URI`);

/**
 * Wire format of a job submission.
 */
const JobRequestSchema = z.object({
  aggr_id: z
    .string({
      required_error: 'aggr_id is required',
      invalid_type_error: 'aggr_id must be a string',
    })
    .min(1, 'aggr_id is required'),
  url: absoluteUri('url'),
  callback_url: absoluteUri('callback_url'),
  extra: z.string().nullish(),
  // Absent falls back to the processor default; null is rejected
  download_timeout: z
    .number({ invalid_type_error: 'download_timeout must be a number' })
    .int('download_timeout must be an integer')
    .positive('download_timeout must be positive')
    .optional(),
});

export function decodeJobRequest(raw: string | Buffer): DownloadJob.Submission {
  let data: unknown;
  try {
    data = JSON.parse(raw.toString());
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Malformed job request: ${reason}`);
  }

  const result = JobRequestSchema.safeParse(data);

  if (!result.success) {
    const issues = result.error.errors.map(
      (e) => `${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`,
    );
    throw new ValidationError(
      `Invalid job request:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`,
      issues,
    );
  }

  const request = result.data;
  return {
    aggrId: request.aggr_id,
    url: request.url,
    callbackUrl: request.callback_url,
    extra: request.extra ?? '',
    downloadTimeout: request.download_timeout,
  };
}
