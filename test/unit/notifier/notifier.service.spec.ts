import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { NotifierService } from '../../../src/notifier/notifier.service';
import { DeliverCallbackUseCase } from '../../../src/application/use-cases/deliver-callback.use-case';
import { RecoverCallbacksUseCase } from '../../../src/application/use-cases/recover-callbacks.use-case';
import { SubmitJobUseCase } from '../../../src/application/use-cases/submit-job.use-case';
import { RetryLaterError } from '../../../src/application/ports/output/queue-store.port';
import { NotifierSettings } from '../../../src/config/notifier-settings';
import { DownloadJob } from '../../../src/domain/entities/download-job.entity';
import { JobState } from '../../../src/domain/value-objects/job-state.vo';
import { PoolManagerService } from '../../../src/worker-pool/pool-manager.service';
import { PinoLoggerService } from '../../../src/shared/logging/pino-logger.service';
import {
  InMemoryCallbackClientAdapter,
  InMemoryEventPublisherAdapter,
  InMemoryQueueStoreAdapter,
} from '../../in-memory-adapters';
import {
  createFinishedJob,
  createTestLogger,
  createTestSettings,
  waitFor,
} from '../helpers/mock-factories';

describe('NotifierService', () => {
  let store: InMemoryQueueStoreAdapter;
  let client: InMemoryCallbackClientAdapter;
  let settings: NotifierSettings;
  let pool: PoolManagerService;
  let logger: PinoLoggerService;
  let notifier: NotifierService;

  const createNotifier = (concurrency = 2) => {
    settings = createTestSettings({ concurrency, backoffMs: 5 });
    const deliver = new DeliverCallbackUseCase(
      store,
      client,
      new InMemoryEventPublisherAdapter(),
      settings,
      createTestLogger(),
    );
    pool = new PoolManagerService(settings, deliver, createTestLogger());
    logger = createTestLogger();
    notifier = new NotifierService(
      store,
      pool,
      new RecoverCallbacksUseCase(store, settings, createTestLogger()),
      settings,
      logger,
    );
    return notifier;
  };

  const enqueue = async (job: DownloadJob) => {
    store.seed(job);
    await store.queuePendingCallback(job);
  };

  beforeEach(() => {
    store = new InMemoryQueueStoreAdapter();
    client = new InMemoryCallbackClientAdapter();
    createNotifier();
  });

  afterEach(async () => {
    await notifier.stop();
  });

  it('should deliver queued callbacks and remove the records', async () => {
    await enqueue(createFinishedJob('job-1'));
    await enqueue(createFinishedJob('job-2'));

    await notifier.start();

    await waitFor(() => expect(store.getRecordCount()).toBe(0));
    expect(client.getCalls().map((call) => call.callbackUrl).sort()).toEqual([
      'https://client.test/hooks/job-1',
      'https://client.test/hooks/job-2',
    ]);
  });

  it('should deliver a job handed over by the download processor', async () => {
    const submit = new SubmitJobUseCase(store, createTestLogger());
    const { job } = await submit.execute({
      payload: JSON.stringify({
        aggr_id: 'aggr-1',
        url: 'https://origin.test/a.csv',
        callback_url: 'https://client.test/hook',
        extra: 'batch-7',
      }),
    });
    await notifier.start();

    // Processor side: take the job, record the outcome, hand it to the notifier
    const downloaded = DownloadJob.withDownloadSuccess(await store.popDownload());
    await store.saveJob(downloaded);
    await store.queuePendingCallback(downloaded);

    await waitFor(() => expect(store.getRecord(job.id)).toBeUndefined());
    expect(client.getCalls()[0].payload).toEqual({
      success: true,
      error: '',
      extra: 'batch-7',
      download_url: `https://files.test/downloads/${job.id}`,
    });
  });

  it('should re-queue callbacks left InProgress before dispatching', async () => {
    store.seed(createFinishedJob('job-1', { callbackState: JobState.IN_PROGRESS, callbackCount: 1 }));
    client.reply(500);

    await notifier.start();

    // The recovered attempt is the second one, so a failure is final
    await waitFor(() => expect(store.getRecord('job-1')?.callbackState).toBe(JobState.FAILED));
    expect(store.getRecord('job-1')?.callbackCount).toBe(2);
    expect(client.getCallCount()).toBe(1);
  });

  it('should retry a failed callback through the queue', async () => {
    await enqueue(createFinishedJob('job-1'));
    client.reply(500, 200);

    await notifier.start();

    await waitFor(() => expect(store.getRecord('job-1')).toBeUndefined());
    expect(client.getCallCount()).toBe(2);
  });

  it('should give up after two failed attempts and keep the record', async () => {
    await enqueue(createFinishedJob('job-1'));
    client.reply(500, 500);

    await notifier.start();

    await waitFor(() => expect(store.getRecord('job-1')?.callbackState).toBe(JobState.FAILED));
    expect(store.getRecord('job-1')).toMatchObject({
      callbackCount: 2,
      callbackMeta: 'Received status: 500',
    });
    expect(store.getQueuedIds('pending-callbacks')).toEqual([]);
  });

  it('should keep polling an empty queue without logging errors', async () => {
    const errorSpy = vi.spyOn(logger, 'error');

    await notifier.start();

    await waitFor(() => expect(store.popCallbackCalls).toBeGreaterThanOrEqual(3));
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should back off after store errors and then resume', async () => {
    const errorSpy = vi.spyOn(logger, 'error');
    store.failNextPop(new RetryLaterError('message leased'), new Error('connection lost'));
    await enqueue(createFinishedJob('job-1'));

    await notifier.start();

    await waitFor(() => expect(store.getRecord('job-1')).toBeUndefined());
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith({ error: 'connection lost' }, 'Failed to pop callback');
  });

  describe('stop', () => {
    it('should finish in-flight deliveries and return a held job to the queue', async () => {
      createNotifier(1);
      const release = client.hold();
      await enqueue(createFinishedJob('job-1'));
      await enqueue(createFinishedJob('job-2'));

      await notifier.start();
      await waitFor(() => {
        expect(pool.getStats().waitingSubmissions).toBe(1);
        expect(client.getCallCount()).toBe(1);
      });

      const stopping = notifier.stop();
      release();
      await stopping;

      expect(store.getRecord('job-1')).toBeUndefined();
      expect(client.getCallCount()).toBe(1);
      expect(store.getQueuedIds('pending-callbacks')).toEqual(['job-2']);
      expect(store.getRecord('job-2')).toMatchObject({
        callbackState: JobState.PENDING,
        callbackCount: 0,
      });
    });

    it('should not start a delivery after stopping', async () => {
      await notifier.start();
      await notifier.stop();

      await enqueue(createFinishedJob('job-1'));
      await new Promise((resolve) => setTimeout(resolve, 30));

      expect(client.getCallCount()).toBe(0);
      expect(store.getQueuedIds('pending-callbacks')).toEqual(['job-1']);
    });

    it('should not dispatch when started after being stopped', async () => {
      await notifier.stop();
      await notifier.start();

      expect(store.popCallbackCalls).toBe(0);
    });
  });
});
