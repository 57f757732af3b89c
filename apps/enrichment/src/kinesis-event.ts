import { z } from 'zod';
import type { StreamMessage } from '@taxi-stream/domain';

const kinesisEventSchema = z.object({
  Records: z.array(z.unknown()),
});

const kinesisRecordSchema = z.object({
  eventID: z.string().optional(),
  kinesis: z.object({
    data: z.string(),
    partitionKey: z.string().optional(),
    sequenceNumber: z.string().optional(),
  }),
});

export interface KinesisBatch {
  messages: StreamMessage[];
  /** Records whose envelope lacked `kinesis.data`; they count as failed. */
  rejected: number;
}

/** Unwrap a stream-trigger event. Returns undefined when there is no Records array. */
export function readKinesisEvent(event: unknown): KinesisBatch | undefined {
  const envelope = kinesisEventSchema.safeParse(event);
  if (!envelope.success) return undefined;

  const batch: KinesisBatch = { messages: [], rejected: 0 };
  for (const record of envelope.data.Records) {
    const parsed = kinesisRecordSchema.safeParse(record);
    if (!parsed.success) {
      batch.rejected++;
      continue;
    }
    const { data, partitionKey, sequenceNumber } = parsed.data.kinesis;
    batch.messages.push({ data, partitionKey, sequenceNumber });
  }
  return batch;
}
