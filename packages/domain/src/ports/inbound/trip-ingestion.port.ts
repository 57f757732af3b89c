// ---------------------------------------------------------------------------
// Producer run summary
// ---------------------------------------------------------------------------

export type IngestionStatus = 'completed' | 'source_not_found';

export interface IngestionSummary {
  status: IngestionStatus;
  read: number; // rows read from the source
  skipped: number; // rows refused at admission
  sent: number; // records accepted by the stream
  failed: number; // records dropped by a failed or partially failed publish
  batches: number; // bulk publishes attempted
}

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export const DEFAULT_BATCH_SIZE = 100;

export interface TripIngestionPort {
  sendAll(sourcePath: string, streamName: string, batchSize?: number): Promise<IngestionSummary>;
}
