/**
 * Input Ports (Driving Ports) Barrel Export
 */
export type { SubmitJobPort, SubmitJobCommand, SubmitJobResult } from './submit-job.port';
export type {
  DeliverCallbackPort,
  DeliverCallbackCommand,
  DeliverCallbackResult,
  DeliveryOutcome,
} from './deliver-callback.port';
export type { RecoverCallbacksPort, RecoverCallbacksResult } from './recover-callbacks.port';
