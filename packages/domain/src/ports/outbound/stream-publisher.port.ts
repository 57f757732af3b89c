export interface StreamEntry {
  readonly data: Uint8Array;
  readonly partitionKey: string;
}

export interface StreamPublishResult {
  failedRecordCount: number;
}

export interface StreamPublisherPort {
  putRecords(streamName: string, entries: readonly StreamEntry[]): Promise<StreamPublishResult>;
}
