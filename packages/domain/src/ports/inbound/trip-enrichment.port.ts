import type { BatchCounts } from '../../entities/record-outcome.js';

/** One stream record as delivered by the ingress stream. */
export interface StreamMessage {
  data: string; // base64 of the JSON payload
  partitionKey?: string;
  sequenceNumber?: string;
}

export interface TripEnrichmentPort {
  enrichBatch(messages: readonly StreamMessage[]): Promise<BatchCounts>;
}
