import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { ApplicationModule } from './application/application.module';
import { NotifierModule } from './notifier/notifier.module';

/**
 * Application Module
 * Callback notifier of the download pipeline: drains the pending-callback SQS
 * queue and delivers webhooks to clients
 */
@Module({
  imports: [ConfigModule, SharedModule, ApplicationModule, NotifierModule],
})
export class AppModule {}
