/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export {
  type QueueStorePort,
  type ScanPage,
  EmptyQueueError,
  RetryLaterError,
  JobNotFoundError,
  JOB_KEY_PREFIX,
  SCAN_START_CURSOR,
  jobKey,
  jobIdFromKey,
} from './queue-store.port';
export type { CallbackClientPort, CallbackResponse } from './callback-client.port';
export type { EventPublisherPort } from './event-publisher.port';
