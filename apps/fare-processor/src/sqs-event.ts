import { z } from 'zod';
import type { QueuedTripMessage } from '@taxi-stream/domain';

const sqsEventSchema = z.object({
  Records: z.array(z.unknown()),
});

const sqsRecordSchema = z.object({
  messageId: z.string().optional(),
  body: z.string(),
});

export interface SqsBatch {
  messages: QueuedTripMessage[];
  /** Records without a string body; they count as failed. */
  rejected: number;
}

export function readSqsEvent(event: unknown): SqsBatch | undefined {
  const envelope = sqsEventSchema.safeParse(event);
  if (!envelope.success) return undefined;

  const batch: SqsBatch = { messages: [], rejected: 0 };
  for (const record of envelope.data.Records) {
    const parsed = sqsRecordSchema.safeParse(record);
    if (parsed.success) {
      batch.messages.push({ messageId: parsed.data.messageId, body: parsed.data.body });
    } else {
      batch.rejected++;
    }
  }
  return batch;
}
