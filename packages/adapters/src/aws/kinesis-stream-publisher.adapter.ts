import { PutRecordsCommand } from '@aws-sdk/client-kinesis';
import type { PutRecordsCommandOutput } from '@aws-sdk/client-kinesis';
import type { StreamEntry, StreamPublisherPort, StreamPublishResult } from '@taxi-stream/domain';
import { getKinesisClient } from './clients.js';

export interface KinesisSender {
  send(command: PutRecordsCommand): Promise<PutRecordsCommandOutput>;
}

export class KinesisStreamPublisher implements StreamPublisherPort {
  constructor(private readonly client: KinesisSender = getKinesisClient()) {}

  async putRecords(
    streamName: string,
    entries: readonly StreamEntry[],
  ): Promise<StreamPublishResult> {
    const response = await this.client.send(
      new PutRecordsCommand({
        StreamName: streamName,
        Records: entries.map((e) => ({ Data: e.data, PartitionKey: e.partitionKey })),
      }),
    );
    return { failedRecordCount: response.FailedRecordCount ?? 0 };
  }
}
