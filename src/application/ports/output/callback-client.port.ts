import { CallbackPayload } from '../../../domain/entities/download-job.entity';

export interface CallbackResponse {
  statusCode: number;
}

/**
 * Callback Client Port (Driven Port)
 * POSTs a callback payload as JSON to a client endpoint.
 *
 * Rejects on transport failures and timeouts; any HTTP status resolves.
 */
export interface CallbackClientPort {
  post(callbackUrl: string, payload: CallbackPayload): Promise<CallbackResponse>;
}
