import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { ApplicationModule } from '../application/application.module';
import { PoolManagerService } from './pool-manager.service';

@Module({
  imports: [ConfigModule, ApplicationModule],
  providers: [PoolManagerService],
  exports: [PoolManagerService],
})
export class WorkerPoolModule {}
