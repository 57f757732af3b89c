import { PutRecordCommand } from '@aws-sdk/client-firehose';
import type { PutRecordCommandOutput } from '@aws-sdk/client-firehose';
import type { AnalyticsSinkPort } from '@taxi-stream/domain';
import { getFirehoseClient } from './clients.js';

export interface FirehoseSender {
  send(command: PutRecordCommand): Promise<PutRecordCommandOutput>;
}

const encoder = new TextEncoder();

export class FirehoseAnalyticsSink implements AnalyticsSinkPort {
  constructor(
    private readonly deliveryStreamName: string,
    private readonly client: FirehoseSender = getFirehoseClient(),
  ) {}

  async putRecord(line: string): Promise<void> {
    await this.client.send(
      new PutRecordCommand({
        DeliveryStreamName: this.deliveryStreamName,
        Record: { Data: encoder.encode(line) },
      }),
    );
  }
}
