import { setTimeout as sleep } from 'timers/promises';
import {
  ConfigurationError,
  DEFAULT_BATCH_SIZE,
  SourceNotFoundError,
  describeError,
  encodeStreamPayload,
} from '@taxi-stream/domain';
import type {
  IngestionSummary,
  SourceRow,
  StreamEntry,
  StreamPublisherPort,
  TripIngestionPort,
  TripSourcePort,
} from '@taxi-stream/domain';
import { normalizeRow } from './row-normalizer.js';

export interface TripProducerOptions {
  source: TripSourcePort;
  publisher: StreamPublisherPort;
  /** Pause after each successful full batch, bounding the outbound rate. */
  pauseMs?: number;
  pause?: (ms: number) => Promise<unknown>;
}

/**
 * Ingestion producer: single-threaded, strictly sequential.
 * Failed batches are logged and dropped; nothing is retried.
 */
export class TripProducer implements TripIngestionPort {
  private readonly source: TripSourcePort;
  private readonly publisher: StreamPublisherPort;
  private readonly pauseMs: number;
  private readonly pause: (ms: number) => Promise<unknown>;

  constructor(opts: TripProducerOptions) {
    this.source = opts.source;
    this.publisher = opts.publisher;
    this.pauseMs = opts.pauseMs ?? 100;
    this.pause = opts.pause ?? sleep;
  }

  async sendAll(
    sourcePath: string,
    streamName: string,
    batchSize: number = DEFAULT_BATCH_SIZE,
  ): Promise<IngestionSummary> {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ConfigurationError(`batch size must be a positive integer, got ${batchSize}`, [
        'BATCH_SIZE',
      ]);
    }

    const summary: IngestionSummary = {
      status: 'completed',
      read: 0,
      skipped: 0,
      sent: 0,
      failed: 0,
      batches: 0,
    };
    console.log(`[producer] sending data from '${sourcePath}' to stream '${streamName}'...`);

    let rows: SourceRow[];
    try {
      rows = await this.source.readRows(sourcePath);
    } catch (err) {
      if (err instanceof SourceNotFoundError) {
        console.error(`[producer] error: ${err.message}`);
        return { ...summary, status: 'source_not_found' };
      }
      throw err;
    }

    let batch: StreamEntry[] = [];
    for (const row of rows) {
      summary.read++;
      const admission = normalizeRow(row);
      if (!admission.admitted) {
        console.warn(`[producer] skipping trip_id ${admission.tripId}: ${admission.reason}`);
        summary.skipped++;
        continue;
      }

      batch.push({ data: encodeStreamPayload(admission.record), partitionKey: admission.tripId });

      if (batch.length >= batchSize) {
        const ok = await this.publish(streamName, batch, summary);
        batch = [];
        if (ok) await this.pause(this.pauseMs);
      }
    }

    if (batch.length > 0) {
      await this.publish(streamName, batch, summary);
    }

    console.log(
      `[producer] finished: read=${summary.read} sent=${summary.sent} ` +
        `skipped=${summary.skipped} failed=${summary.failed} batches=${summary.batches}`,
    );
    return summary;
  }

  private async publish(
    streamName: string,
    batch: StreamEntry[],
    summary: IngestionSummary,
  ): Promise<boolean> {
    summary.batches++;
    try {
      const { failedRecordCount } = await this.publisher.putRecords(streamName, batch);
      console.log(`[producer] sent batch of ${batch.length} records`);
      if (failedRecordCount > 0) {
        console.warn(`[producer] WARNING: ${failedRecordCount} records failed`);
      }
      summary.sent += batch.length - failedRecordCount;
      summary.failed += failedRecordCount;
      return true;
    } catch (err) {
      console.error(
        `[producer] error sending batch of ${batch.length} records: ${describeError(err)}`,
      );
      summary.failed += batch.length;
      return false;
    }
  }
}
