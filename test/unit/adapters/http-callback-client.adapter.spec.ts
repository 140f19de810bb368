import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MockAgent } from 'undici';
import { HttpCallbackClientAdapter } from '../../../src/infrastructure/adapters/http/http-callback-client.adapter';
import { HttpClientService } from '../../../src/shared/http/http-client.service';
import { CallbackPayload } from '../../../src/domain/entities/download-job.entity';
import { createTestLogger, createTestSettings } from '../helpers/mock-factories';

describe('HttpCallbackClientAdapter', () => {
  const payload: CallbackPayload = {
    success: false,
    error: 'timeout',
    extra: '',
    download_url: '',
  };
  let mockAgent: MockAgent;
  let httpClient: HttpClientService;
  let adapter: HttpCallbackClientAdapter;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    httpClient = new HttpClientService(createTestLogger(), mockAgent);
    adapter = new HttpCallbackClientAdapter(httpClient, createTestSettings({ callbackTimeoutMs: 150 }));
  });

  afterEach(async () => {
    mockAgent.assertNoPendingInterceptors();
    await mockAgent.close();
  });

  it('should POST the payload and report the status', async () => {
    mockAgent
      .get('http://dst')
      .intercept({ path: '/cb', method: 'POST', body: JSON.stringify(payload) })
      .reply(503, 'unavailable');

    await expect(adapter.post('http://dst/cb', payload)).resolves.toEqual({ statusCode: 503 });
  });

  it('should make a single attempt bounded by the callback timeout', async () => {
    const postSpy = vi.spyOn(httpClient, 'post');
    mockAgent
      .get('http://dst')
      .intercept({ path: '/cb', method: 'POST' })
      .replyWithError(new Error('connect ECONNREFUSED'));

    await expect(adapter.post('http://dst/cb', payload)).rejects.toThrow('connect ECONNREFUSED');
    expect(postSpy).toHaveBeenCalledWith('http://dst/cb', payload, {
      timeout: 150,
      maxRetries: 0,
    });
  });
});
