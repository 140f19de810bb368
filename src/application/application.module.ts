import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { DELIVER_CALLBACK_PORT } from './ports/tokens';

// Use Cases
import {
  SubmitJobUseCase,
  DeliverCallbackUseCase,
  RecoverCallbacksUseCase,
} from './use-cases';

/**
 * Application Module
 * Contains all use cases. Output ports are bound by the InfrastructureModule.
 */
@Module({
  imports: [InfrastructureModule],
  providers: [
    SubmitJobUseCase,
    DeliverCallbackUseCase,
    RecoverCallbacksUseCase,
    {
      provide: DELIVER_CALLBACK_PORT,
      useExisting: DeliverCallbackUseCase,
    },
  ],
  exports: [
    // Driving adapters (the notifier, the worker pool) depend on these
    SubmitJobUseCase,
    RecoverCallbacksUseCase,
    DELIVER_CALLBACK_PORT,
  ],
})
export class ApplicationModule {}
