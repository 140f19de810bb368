import { DomainEvent } from './base.event';

/**
 * Callback Failed Event
 * Emitted when a callback is given up on; the job record stays in the store
 * with CallbackState = Failed
 */
export interface CallbackFailedEventPayload {
  jobId: string;
  aggrId: string;
  callbackUrl: string;
  attempts: number;
  reason: string;
  failureReason: 'attempts_exhausted' | 'download_not_concluded';
}

export class CallbackFailedEvent extends DomainEvent {
  constructor(public readonly payload: CallbackFailedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'callback.failed';
  }

  get jobId(): string {
    return this.payload.jobId;
  }

  get failureReason(): string {
    return this.payload.failureReason;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
