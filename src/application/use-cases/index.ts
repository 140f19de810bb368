/**
 * Use Cases Barrel Export
 */
export { SubmitJobUseCase } from './submit-job.use-case';
export { DeliverCallbackUseCase } from './deliver-callback.use-case';
export { RecoverCallbacksUseCase } from './recover-callbacks.use-case';
