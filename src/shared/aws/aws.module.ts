import { Module } from '@nestjs/common';
import { SqsModule } from './sqs/sqs.module';
import { DynamoDbModule } from './dynamodb/dynamodb.module';

@Module({
  imports: [SqsModule, DynamoDbModule],
  exports: [SqsModule, DynamoDbModule],
})
export class AwsModule {}
