// Export all in-memory adapters for easy import
export { InMemoryQueueStoreAdapter } from './in-memory-queue-store.adapter';
export { InMemoryCallbackClientAdapter } from './in-memory-callback-client.adapter';
export type { CallbackReply, RecordedCallback } from './in-memory-callback-client.adapter';
export { InMemoryEventPublisherAdapter } from './in-memory-event-publisher.adapter';
