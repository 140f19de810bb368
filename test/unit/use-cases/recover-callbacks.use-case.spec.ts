import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RecoverCallbacksUseCase } from '../../../src/application/use-cases/recover-callbacks.use-case';
import { JobNotFoundError } from '../../../src/application/ports/output/queue-store.port';
import { JobState } from '../../../src/domain/value-objects/job-state.vo';
import { PinoLoggerService } from '../../../src/shared/logging/pino-logger.service';
import { InMemoryQueueStoreAdapter } from '../../in-memory-adapters';
import {
  createFinishedJob,
  createTestLogger,
  createTestSettings,
} from '../helpers/mock-factories';

describe('RecoverCallbacksUseCase', () => {
  let store: InMemoryQueueStoreAdapter;
  let logger: PinoLoggerService;
  let useCase: RecoverCallbacksUseCase;

  beforeEach(() => {
    store = new InMemoryQueueStoreAdapter();
    logger = createTestLogger();
    useCase = new RecoverCallbacksUseCase(
      store,
      createTestSettings({ scanBatchSize: 2 }),
      logger,
    );

    store.seed(createFinishedJob('job-a', { callbackState: JobState.IN_PROGRESS, callbackCount: 1 }));
    store.seed(createFinishedJob('job-b'));
    store.seed(createFinishedJob('job-c', { callbackState: JobState.FAILED, callbackCount: 2 }));
    store.seed(createFinishedJob('job-d', { callbackState: JobState.IN_PROGRESS, callbackCount: 1 }));
  });

  it('should re-queue every InProgress callback across pages', async () => {
    const result = await useCase.execute();

    expect(result).toEqual({ scanned: 4, recovered: 2 });
    expect(store.getQueuedIds('pending-callbacks')).toEqual(['job-a', 'job-d']);
  });

  it('should leave the records untouched', async () => {
    const before = store.getRecord('job-a');

    await useCase.execute();

    expect(store.getRecord('job-a')).toBe(before);
    expect(store.getSaveHistory()).toEqual([]);
  });

  it('should queue a job only once when the scan repeats keys', async () => {
    store.seed(createFinishedJob('job-c', { callbackState: JobState.IN_PROGRESS }));
    store.repeatScanKeys(true);

    const result = await useCase.execute();

    expect(result).toEqual({ scanned: 4, recovered: 3 });
    expect(store.getQueuedIds('pending-callbacks')).toEqual(['job-a', 'job-c', 'job-d']);
  });

  it('should log the recovered count', async () => {
    const infoSpy = vi.spyOn(logger, 'info');

    await useCase.execute();

    expect(infoSpy).toHaveBeenCalledWith({ scanned: 4, recovered: 2 }, 'Queued rogue callbacks');
  });

  it('should skip a job removed after it was scanned', async () => {
    vi.spyOn(store, 'getJob').mockRejectedValueOnce(new JobNotFoundError('job-a'));

    const result = await useCase.execute();

    expect(result).toEqual({ scanned: 4, recovered: 1 });
    expect(store.getQueuedIds('pending-callbacks')).toEqual(['job-d']);
  });

  it('should log a failed read and carry on', async () => {
    const errorSpy = vi.spyOn(logger, 'error');
    vi.spyOn(store, 'getJob').mockRejectedValueOnce(new Error('read timeout'));

    const result = await useCase.execute();

    expect(result.recovered).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(
      { jobId: 'job-a', error: 'read timeout' },
      'Could not recover callback',
    );
  });

  it('should stop at a scan error', async () => {
    const errorSpy = vi.spyOn(logger, 'error');
    store.failScan(new Error('scan refused'));

    const result = await useCase.execute();

    expect(result).toEqual({ scanned: 0, recovered: 0 });
    expect(errorSpy).toHaveBeenCalledWith(
      { cursor: '0', error: 'scan refused' },
      'Recovery scan aborted',
    );
  });

  it('should finish on an empty store', async () => {
    store.clear();

    await expect(useCase.execute()).resolves.toEqual({ scanned: 0, recovered: 0 });
  });
});
