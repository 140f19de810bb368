import { Inject, Injectable } from '@nestjs/common';
import {
  CallbackClientPort,
  CallbackResponse,
} from '../../../application/ports/output/callback-client.port';
import { CallbackPayload } from '../../../domain/entities/download-job.entity';
import { NOTIFIER_SETTINGS, NotifierSettings } from '../../../config/notifier-settings';
import { HttpClientService } from '../../../shared/http/http-client.service';

/**
 * HTTP Callback Client Adapter
 * Implements CallbackClientPort over the pooled undici client.
 *
 * Each call is a single attempt bounded by the callback deadline; retrying is the
 * notifier's job, through the pending-callback queue.
 */
@Injectable()
export class HttpCallbackClientAdapter implements CallbackClientPort {
  constructor(
    private readonly httpClient: HttpClientService,
    @Inject(NOTIFIER_SETTINGS) private readonly settings: NotifierSettings,
  ) {}

  async post(callbackUrl: string, payload: CallbackPayload): Promise<CallbackResponse> {
    const response = await this.httpClient.post(callbackUrl, payload, {
      timeout: this.settings.callbackTimeoutMs,
      maxRetries: 0,
    });

    return { statusCode: response.statusCode };
  }
}
