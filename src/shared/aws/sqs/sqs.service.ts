import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  SQSClient,
  ReceiveMessageCommand,
  DeleteMessageCommand,
  SendMessageCommand,
} from '@aws-sdk/client-sqs';
import { AppConfig } from '../../../config/configuration';
import {
  SqsMessageEnvelope,
  SqsDeleteResult,
  SqsSendResult,
} from '../interfaces/sqs-message.interface';
import { PinoLoggerService } from '../../logging/pino-logger.service';

@Injectable()
export class SqsService implements OnModuleDestroy {
  private readonly client: SQSClient;
  private readonly waitTimeSeconds: number;
  private readonly visibilityTimeout: number;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    private readonly logger: PinoLoggerService,
  ) {
    const awsConfig = this.configService.getOrThrow('aws', { infer: true });
    const sqsConfig = this.configService.getOrThrow('sqs', { infer: true });

    this.client = new SQSClient({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.waitTimeSeconds = sqsConfig.waitTimeSeconds;
    this.visibilityTimeout = sqsConfig.visibilityTimeout;

    this.logger.setContext(SqsService.name);
  }

  async receiveMessages(queueUrl: string, maxMessages = 1): Promise<SqsMessageEnvelope[]> {
    const command = new ReceiveMessageCommand({
      QueueUrl: queueUrl,
      MaxNumberOfMessages: maxMessages,
      WaitTimeSeconds: this.waitTimeSeconds,
      VisibilityTimeout: this.visibilityTimeout,
      MessageSystemAttributeNames: ['ApproximateReceiveCount'],
    });

    const response = await this.client.send(command);

    const envelopes: SqsMessageEnvelope[] = [];
    for (const message of response.Messages ?? []) {
      if (!message.ReceiptHandle) {
        this.logger.warn({ messageId: message.MessageId }, 'Message without receipt handle');
        continue;
      }
      envelopes.push({
        message,
        body: message.Body ?? '',
        receiptHandle: message.ReceiptHandle,
        messageId: message.MessageId ?? '',
        approximateReceiveCount: parseInt(
          message.Attributes?.ApproximateReceiveCount || '1',
          10,
        ),
      });
    }
    return envelopes;
  }

  async deleteMessage(queueUrl: string, receiptHandle: string): Promise<SqsDeleteResult> {
    try {
      await this.client.send(
        new DeleteMessageCommand({
          QueueUrl: queueUrl,
          ReceiptHandle: receiptHandle,
        }),
      );
      return { messageId: receiptHandle, success: true };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error({ error: err.message, receiptHandle }, 'Failed to delete message');
      return {
        messageId: receiptHandle,
        success: false,
        error: err,
      };
    }
  }

  async sendMessage<T>(queueUrl: string, body: T): Promise<SqsSendResult> {
    const command = new SendMessageCommand({
      QueueUrl: queueUrl,
      MessageBody: JSON.stringify(body),
    });

    const response = await this.client.send(command);

    return {
      messageId: response.MessageId ?? '',
    };
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
