import { Module } from '@nestjs/common';
import { ApplicationModule } from '../application/application.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { WorkerPoolModule } from '../worker-pool/worker-pool.module';
import { NotifierService } from './notifier.service';

@Module({
  imports: [ApplicationModule, InfrastructureModule, WorkerPoolModule],
  providers: [NotifierService],
  exports: [NotifierService],
})
export class NotifierModule {}
