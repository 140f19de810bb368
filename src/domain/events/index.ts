/**
 * Domain Events Barrel Export
 */
export { DomainEvent } from './base.event';
export {
  CallbackDeliveredEvent,
  type CallbackDeliveredEventPayload,
} from './callback-delivered.event';
export { CallbackFailedEvent, type CallbackFailedEventPayload } from './callback-failed.event';
