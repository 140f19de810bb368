import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  DeleteCommand,
  ScanCommand,
} from '@aws-sdk/lib-dynamodb';
import { AppConfig } from '../../../config/configuration';
import { PinoLoggerService } from '../../logging/pino-logger.service';

/**
 * Stored shape of a job record. `jobKey` is the table's partition key.
 */
export interface JobItem {
  jobKey: string;
  id: string;
  aggrId: string;
  url: string;
  callbackUrl: string;
  extra: string;
  downloadTimeout?: number;
  downloadState: string;
  downloadMeta: string;
  callbackState: string;
  callbackMeta: string;
  callbackCount: number;
  updatedAt?: string;
}

export type TableKey = Record<string, string>;

export interface JobKeyPage {
  keys: string[];
  lastEvaluatedKey?: Record<string, unknown>;
}

@Injectable()
export class DynamoDbService implements OnModuleDestroy {
  private readonly client: DynamoDBClient;
  private readonly docClient: DynamoDBDocumentClient;
  private readonly tableName: string;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    private readonly logger: PinoLoggerService,
  ) {
    const awsConfig = this.configService.getOrThrow('aws', { infer: true });
    const dynamoConfig = this.configService.getOrThrow('dynamodb', { infer: true });

    this.client = new DynamoDBClient({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.docClient = DynamoDBDocumentClient.from(this.client, {
      marshallOptions: {
        removeUndefinedValues: true,
      },
    });

    this.tableName = dynamoConfig.tableName;
    this.logger.setContext(DynamoDbService.name);
  }

  /**
   * Raw item, or null when absent. Callers validate the shape.
   */
  async getJobItem(jobKey: string): Promise<Record<string, unknown> | null> {
    const result = await this.docClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { jobKey },
        ConsistentRead: true,
      }),
    );

    return result.Item ?? null;
  }

  async putJobItem(item: JobItem): Promise<void> {
    await this.docClient.send(
      new PutCommand({
        TableName: this.tableName,
        Item: { ...item, updatedAt: new Date().toISOString() },
      }),
    );

    this.logger.debug({ jobKey: item.jobKey }, 'Job item written');
  }

  async deleteJobItem(jobKey: string): Promise<void> {
    await this.docClient.send(
      new DeleteCommand({
        TableName: this.tableName,
        Key: { jobKey },
      }),
    );

    this.logger.debug({ jobKey }, 'Job item deleted');
  }

  /**
   * One page of keys starting with `prefix`. `limit` bounds the items examined,
   * so a page may come back empty while `lastEvaluatedKey` is still set.
   */
  async scanJobKeys(
    prefix: string,
    limit: number,
    exclusiveStartKey?: TableKey,
  ): Promise<JobKeyPage> {
    const result = await this.docClient.send(
      new ScanCommand({
        TableName: this.tableName,
        ProjectionExpression: 'jobKey',
        FilterExpression: 'begins_with(jobKey, :prefix)',
        ExpressionAttributeValues: { ':prefix': prefix },
        Limit: limit,
        ExclusiveStartKey: exclusiveStartKey,
      }),
    );

    const keys: string[] = [];
    for (const item of result.Items ?? []) {
      const key: unknown = item.jobKey;
      if (typeof key === 'string') {
        keys.push(key);
      }
    }

    return { keys, lastEvaluatedKey: result.LastEvaluatedKey };
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
