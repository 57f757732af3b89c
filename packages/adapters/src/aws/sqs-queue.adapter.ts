import { SendMessageCommand } from '@aws-sdk/client-sqs';
import type { SendMessageCommandOutput } from '@aws-sdk/client-sqs';
import type { DeadLetter, DeadLetterPort, WorkQueuePort } from '@taxi-stream/domain';
import { getSqsClient } from './clients.js';

export interface SqsSender {
  send(command: SendMessageCommand): Promise<SendMessageCommandOutput>;
}

export class SqsWorkQueue implements WorkQueuePort {
  constructor(
    private readonly queueUrl: string,
    private readonly client: SqsSender = getSqsClient(),
  ) {}

  async sendMessage(body: string): Promise<void> {
    await this.client.send(new SendMessageCommand({ QueueUrl: this.queueUrl, MessageBody: body }));
  }
}

/** Parks messages a stage gave up on, with the reason, for later inspection or replay. */
export class SqsDeadLetterQueue implements DeadLetterPort {
  private readonly queue: SqsWorkQueue;

  constructor(queueUrl: string, client: SqsSender = getSqsClient()) {
    this.queue = new SqsWorkQueue(queueUrl, client);
  }

  async sendDeadLetter(letter: DeadLetter): Promise<void> {
    await this.queue.sendMessage(
      JSON.stringify({
        stage: letter.stage,
        reason: letter.reason,
        tripId: letter.tripId,
        payload: letter.payload,
        failedAt: letter.failedAt.toISOString(),
      }),
    );
  }
}
