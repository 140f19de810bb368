import { DomainEvent } from './base.event';

/**
 * Callback Delivered Event
 * Emitted when a client accepted the callback and the job record was removed
 */
export interface CallbackDeliveredEventPayload {
  jobId: string;
  aggrId: string;
  callbackUrl: string;
  attempts: number;
  statusCode: number;
}

export class CallbackDeliveredEvent extends DomainEvent {
  constructor(public readonly payload: CallbackDeliveredEventPayload) {
    super();
  }

  get eventName(): string {
    return 'callback.delivered';
  }

  get jobId(): string {
    return this.payload.jobId;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
