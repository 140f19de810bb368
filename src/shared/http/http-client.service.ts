import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { Dispatcher } from 'undici';
import { PinoLoggerService } from '../logging/pino-logger.service';

/**
 * Token for the dispatcher every request goes through. HttpModule provides a
 * keep-alive undici Agent, which opens a pool per origin and closes it once its
 * connections go idle; tests provide an undici MockAgent.
 */
export const HTTP_DISPATCHER = 'HttpDispatcher';

export interface HttpRequestOptions {
  method?: Dispatcher.HttpMethod;
  headers?: Record<string, string>;
  body?: string | Buffer;
  /** Deadline for the whole exchange, headers and body included. */
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
}

export interface HttpResponse {
  statusCode: number;
  headers: Dispatcher.ResponseData['headers'];
  body: unknown;
}

@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly defaultTimeout = 30000;
  private readonly defaultMaxRetries = 3;
  private readonly defaultRetryDelay = 1000;

  constructor(
    private readonly logger: PinoLoggerService,
    @Inject(HTTP_DISPATCHER) private readonly dispatcher: Dispatcher,
  ) {
    this.logger.setContext(HttpClientService.name);
  }

  async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const parsedUrl = new URL(url);
    const maxRetries = options.maxRetries ?? this.defaultMaxRetries;
    const retryDelay = options.retryDelay ?? this.defaultRetryDelay;
    const timeout = options.timeout ?? this.defaultTimeout;

    let lastError: Error = new Error(`HTTP request to ${url} was not attempted`);

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        const response = await this.dispatcher.request({
          origin: parsedUrl.origin,
          path: parsedUrl.pathname + parsedUrl.search,
          method: options.method || 'GET',
          headers: options.headers,
          body: options.body,
          headersTimeout: timeout,
          bodyTimeout: timeout,
          signal: AbortSignal.timeout(timeout),
        });

        const bodyText = await response.body.text();

        return {
          statusCode: response.statusCode,
          headers: response.headers,
          body: this.parseBody(bodyText),
        };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (attempt < maxRetries) {
          this.logger.warn(
            { url, attempt, error: lastError.message },
            'HTTP request failed, retrying',
          );
          await this.delay(retryDelay * Math.pow(2, attempt));
        }
      }
    }

    this.logger.error(
      { url, maxRetries, error: lastError.message },
      'HTTP request failed after all retries',
    );
    throw lastError;
  }

  async post(
    url: string,
    body: unknown,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, {
      ...options,
      method: 'POST',
      body: JSON.stringify(body),
      headers: {
        'Content-Type': 'application/json',
        ...options?.headers,
      },
    });
  }

  private parseBody(bodyText: string): unknown {
    if (bodyText.length === 0) {
      return '';
    }
    try {
      return JSON.parse(bodyText);
    } catch {
      return bodyText;
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  async onModuleDestroy(): Promise<void> {
    await this.dispatcher.close();
  }
}
