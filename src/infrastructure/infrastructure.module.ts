import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';

// Shared services (existing infrastructure)
import { SqsModule } from '../shared/aws/sqs/sqs.module';
import { DynamoDbModule } from '../shared/aws/dynamodb/dynamodb.module';
import { HttpModule } from '../shared/http/http.module';
import { LoggingModule } from '../shared/logging/logging.module';

import {
  CALLBACK_CLIENT_PORT,
  EVENT_PUBLISHER_PORT,
  QUEUE_STORE_PORT,
} from '../application/ports/tokens';

// Adapters (implementations)
import { DynamoDbSqsQueueStoreAdapter } from './adapters/persistence/dynamodb-sqs-queue-store.adapter';
import { HttpCallbackClientAdapter } from './adapters/http/http-callback-client.adapter';
import { LoggingEventPublisherAdapter } from './adapters/events/logging-event-publisher.adapter';

/**
 * Infrastructure Module
 * Binds every output port token to its adapter
 */
@Module({
  imports: [ConfigModule, LoggingModule, SqsModule, DynamoDbModule, HttpModule],
  providers: [
    {
      provide: QUEUE_STORE_PORT,
      useClass: DynamoDbSqsQueueStoreAdapter,
    },
    {
      provide: CALLBACK_CLIENT_PORT,
      useClass: HttpCallbackClientAdapter,
    },
    {
      provide: EVENT_PUBLISHER_PORT,
      useClass: LoggingEventPublisherAdapter,
    },
  ],
  exports: [QUEUE_STORE_PORT, CALLBACK_CLIENT_PORT, EVENT_PUBLISHER_PORT],
})
export class InfrastructureModule {}
