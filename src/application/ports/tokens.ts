// Injection tokens (string symbols for DI)
export const QUEUE_STORE_PORT = 'QueueStorePort';
export const CALLBACK_CLIENT_PORT = 'CallbackClientPort';
export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';
export const DELIVER_CALLBACK_PORT = 'DeliverCallbackPort';
