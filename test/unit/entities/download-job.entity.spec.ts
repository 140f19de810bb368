import { describe, it, expect } from 'vitest';
import { DownloadJob } from '../../../src/domain/entities/download-job.entity';
import { JobState } from '../../../src/domain/value-objects/job-state.vo';

describe('DownloadJob', () => {
  const baseUrl = new URL('https://files.test/downloads/');

  const createJob = (overrides: Partial<DownloadJob.CreateProps> = {}) =>
    DownloadJob.create({
      id: 'job-1',
      aggrId: 'aggr-1',
      url: 'https://origin.test/a.csv',
      callbackUrl: 'https://client.test/hook',
      ...overrides,
    });

  describe('create', () => {
    it('should apply defaults for optional fields', () => {
      const job = createJob();

      expect(job).toEqual({
        id: 'job-1',
        aggrId: 'aggr-1',
        url: 'https://origin.test/a.csv',
        callbackUrl: 'https://client.test/hook',
        extra: '',
        downloadTimeout: undefined,
        downloadState: JobState.PENDING,
        downloadMeta: '',
        callbackState: JobState.PENDING,
        callbackMeta: '',
        callbackCount: 0,
      });
    });

    it('should reject an empty id', () => {
      expect(() => createJob({ id: '  ' })).toThrow('Job ID is required');
    });

    it('should reject an empty aggregation id', () => {
      expect(() => createJob({ aggrId: '' })).toThrow('Aggregation ID is required');
    });

    it('should reject a negative or fractional callback count', () => {
      expect(() => createJob({ callbackCount: -1 })).toThrow(
        'Callback count must be a non-negative integer',
      );
      expect(() => createJob({ callbackCount: 1.5 })).toThrow(
        'Callback count must be a non-negative integer',
      );
    });

    it('should build a pending job from a submission', () => {
      const job = DownloadJob.fromSubmission('job-9', {
        aggrId: 'aggr-9',
        url: 'https://origin.test/b.bin',
        callbackUrl: 'https://client.test/b',
        extra: 'x',
        downloadTimeout: 30,
      });

      expect(job.id).toBe('job-9');
      expect(job.downloadTimeout).toBe(30);
      expect(job.downloadState).toBe(JobState.PENDING);
      expect(job.callbackState).toBe(JobState.PENDING);
      expect(job.callbackCount).toBe(0);
    });
  });

  describe('isEligibleForCallback', () => {
    it.each([
      [JobState.PENDING, false],
      [JobState.IN_PROGRESS, false],
      [JobState.SUCCESS, true],
      [JobState.FAILED, true],
    ])('should return %s → %s', (downloadState, expected) => {
      expect(DownloadJob.isEligibleForCallback(createJob({ downloadState }))).toBe(expected);
    });
  });

  describe('buildDownloadUrl', () => {
    it('should append the job id as the last path segment', () => {
      const job = createJob({ downloadState: JobState.SUCCESS });

      expect(DownloadJob.buildDownloadUrl(job, baseUrl)).toBe(
        'https://files.test/downloads/job-1',
      );
    });

    it('should collapse duplicate slashes in the base path', () => {
      const job = createJob({ downloadState: JobState.SUCCESS });

      expect(DownloadJob.buildDownloadUrl(job, new URL('https://files.test//a//'))).toBe(
        'https://files.test/a/job-1',
      );
    });

    it('should keep the query string of the base URL', () => {
      const job = createJob({ downloadState: JobState.SUCCESS });

      expect(
        DownloadJob.buildDownloadUrl(job, new URL('https://files.test/dl?token=abc')),
      ).toBe('https://files.test/dl/job-1?token=abc');
    });

    it('should be empty unless the download succeeded', () => {
      expect(DownloadJob.buildDownloadUrl(createJob(), baseUrl)).toBe('');
      expect(
        DownloadJob.buildDownloadUrl(createJob({ downloadState: JobState.FAILED }), baseUrl),
      ).toBe('');
    });

    it('should not mutate the base URL', () => {
      DownloadJob.buildDownloadUrl(createJob({ downloadState: JobState.SUCCESS }), baseUrl);

      expect(baseUrl.toString()).toBe('https://files.test/downloads/');
    });
  });

  describe('toCallbackPayload', () => {
    it('should report a successful download', () => {
      const job = createJob({ downloadState: JobState.SUCCESS, extra: 'ref-1' });

      expect(DownloadJob.toCallbackPayload(job, baseUrl)).toEqual({
        success: true,
        error: '',
        extra: 'ref-1',
        download_url: 'https://files.test/downloads/job-1',
      });
    });

    it('should report a failed download with its reason', () => {
      const job = createJob({
        downloadState: JobState.FAILED,
        downloadMeta: 'HTTP 404',
        extra: 'ref-2',
      });

      expect(DownloadJob.toCallbackPayload(job, baseUrl)).toEqual({
        success: false,
        error: 'HTTP 404',
        extra: 'ref-2',
        download_url: '',
      });
    });
  });

  describe('transitions', () => {
    it('should return a new record and leave the original untouched', () => {
      const job = createJob({ downloadState: JobState.SUCCESS });
      const next = DownloadJob.incrementCallbackCount(job);

      expect(next).not.toBe(job);
      expect(next.callbackCount).toBe(1);
      expect(job.callbackCount).toBe(0);
    });

    it('should clear the callback meta when marking in progress', () => {
      const job = createJob({ callbackMeta: 'Received status: 500' });

      const next = DownloadJob.markCallbackInProgress(job);

      expect(next.callbackState).toBe(JobState.IN_PROGRESS);
      expect(next.callbackMeta).toBe('');
    });

    it('should record the reason when marking pending or failed', () => {
      const job = createJob();

      const pending = DownloadJob.markCallbackPending(job, 'timeout');
      const failed = DownloadJob.markCallbackFailed(job, 'Received status: 503');

      expect(pending.callbackState).toBe(JobState.PENDING);
      expect(pending.callbackMeta).toBe('timeout');
      expect(failed.callbackState).toBe(JobState.FAILED);
      expect(failed.callbackMeta).toBe('Received status: 503');
    });

    it('should set the download outcome', () => {
      const job = createJob({ downloadMeta: 'stale' });

      const succeeded = DownloadJob.withDownloadSuccess(job);
      const failed = DownloadJob.withDownloadFailure(job, 'connection reset');

      expect(succeeded.downloadState).toBe(JobState.SUCCESS);
      expect(succeeded.downloadMeta).toBe('');
      expect(failed.downloadState).toBe(JobState.FAILED);
      expect(failed.downloadMeta).toBe('connection reset');
    });
  });
});
