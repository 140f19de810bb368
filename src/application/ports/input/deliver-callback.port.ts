import { DownloadJob } from '../../../domain/entities/download-job.entity';

export interface DeliverCallbackCommand {
  job: DownloadJob;
}

/**
 * - delivered: the client accepted the callback, the record is gone
 * - retrying: the attempt failed and the job is back on the callback queue
 * - failed: attempts are exhausted, the record is kept with CallbackState = Failed
 */
export type DeliveryOutcome = 'delivered' | 'retrying' | 'failed';

export interface DeliverCallbackResult {
  job: DownloadJob;
  outcome: DeliveryOutcome;
}

/**
 * Deliver Callback Port (Driving Port / Use Case Interface)
 * Runs one callback delivery attempt for a job whose download has concluded.
 * Rejects only when a state transition could not be persisted.
 */
export interface DeliverCallbackPort {
  execute(command: DeliverCallbackCommand): Promise<DeliverCallbackResult>;
}
