import type { BatchCounts } from '../../entities/record-outcome.js';

/** One work-queue message; `body` is a JSON-serialized enriched trip. */
export interface QueuedTripMessage {
  messageId?: string;
  body: string;
}

export interface FareProcessingPort {
  processBatch(messages: readonly QueuedTripMessage[]): Promise<BatchCounts>;
}
