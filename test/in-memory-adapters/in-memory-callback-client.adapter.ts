import { Injectable } from '@nestjs/common';
import {
  CallbackClientPort,
  CallbackResponse,
} from '../../src/application/ports/output/callback-client.port';
import { CallbackPayload } from '../../src/domain/entities/download-job.entity';

export interface RecordedCallback {
  callbackUrl: string;
  payload: CallbackPayload;
}

/**
 * Scripted reply: a status code, or an error to reject with.
 */
export type CallbackReply = number | Error;

/**
 * In-Memory Callback Client Adapter
 * Records every POST and answers from a script; 200 once the script runs out.
 */
@Injectable()
export class InMemoryCallbackClientAdapter implements CallbackClientPort {
  private calls: RecordedCallback[] = [];
  private replies: CallbackReply[] = [];
  private gate: Promise<void> | null = null;

  async post(callbackUrl: string, payload: CallbackPayload): Promise<CallbackResponse> {
    this.calls.push({ callbackUrl, payload });

    if (this.gate) {
      await this.gate;
    }

    const reply = this.replies.shift() ?? 200;
    if (reply instanceof Error) {
      throw reply;
    }
    return { statusCode: reply };
  }

  // Test helper methods

  reply(...replies: CallbackReply[]): void {
    this.replies.push(...replies);
  }

  /**
   * Hold every POST until the returned function is called
   */
  hold(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = () => {
        this.gate = null;
        resolve();
      };
    });
    return release;
  }

  getCalls(): RecordedCallback[] {
    return [...this.calls];
  }

  getCallCount(): number {
    return this.calls.length;
  }

  clear(): void {
    this.calls = [];
    this.replies = [];
    this.gate = null;
  }
}
