import { Message } from '@aws-sdk/client-sqs';

export interface SqsMessageEnvelope {
  message: Message;
  /** Raw body; callers decode it. */
  body: string;
  receiptHandle: string;
  messageId: string;
  approximateReceiveCount: number;
}

export interface SqsDeleteResult {
  messageId: string;
  success: boolean;
  error?: Error;
}

export interface SqsSendResult {
  messageId: string;
}
