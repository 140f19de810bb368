import { ConfigurationError } from '../domain/errors/domain.errors';
import { AppConfig } from './configuration';

export const NOTIFIER_SETTINGS = 'NotifierSettings';

/**
 * Validated notifier configuration, injected wherever the delivery engine needs
 * its limits. Tests build it with tiny timeouts and backoffs.
 */
export interface NotifierSettings {
  readonly concurrency: number;
  /** Base of the retrieval links handed to clients. */
  readonly downloadUrl: URL;
  readonly callbackTimeoutMs: number;
  readonly maxCallbackAttempts: number;
  readonly backoffMs: number;
  readonly scanBatchSize: number;
}

export const DEFAULT_NOTIFIER_SETTINGS = {
  callbackTimeoutMs: 3000,
  maxCallbackAttempts: 2,
  backoffMs: 1000,
  scanBatchSize: 50,
} as const;

export type NotifierConfig = Pick<AppConfig['notifier'], 'concurrency' | 'downloadUrl'> &
  Partial<AppConfig['notifier']>;

export function resolveNotifierSettings(config: NotifierConfig): NotifierSettings {
  if (!Number.isInteger(config.concurrency) || config.concurrency <= 0) {
    throw new ConfigurationError('Notifier concurrency must be a positive integer');
  }

  let downloadUrl: URL;
  try {
    downloadUrl = new URL(config.downloadUrl);
  } catch {
    throw new ConfigurationError(`Could not parse download URL '${config.downloadUrl}'`);
  }
  if (downloadUrl.protocol !== 'http:' && downloadUrl.protocol !== 'https:') {
    throw new ConfigurationError(
      `Download URL must be an absolute http(s) URL, got '${config.downloadUrl}'`,
    );
  }

  const settings: NotifierSettings = {
    concurrency: config.concurrency,
    downloadUrl,
    callbackTimeoutMs: config.callbackTimeoutMs ?? DEFAULT_NOTIFIER_SETTINGS.callbackTimeoutMs,
    maxCallbackAttempts:
      config.maxCallbackAttempts ?? DEFAULT_NOTIFIER_SETTINGS.maxCallbackAttempts,
    backoffMs: config.backoffMs ?? DEFAULT_NOTIFIER_SETTINGS.backoffMs,
    scanBatchSize: config.scanBatchSize ?? DEFAULT_NOTIFIER_SETTINGS.scanBatchSize,
  };

  for (const key of ['callbackTimeoutMs', 'maxCallbackAttempts', 'backoffMs', 'scanBatchSize'] as const) {
    if (!(settings[key] > 0)) {
      throw new ConfigurationError(`Notifier ${key} must be positive`);
    }
  }

  return settings;
}
