import {
  ConfigurationError,
  batchResponse,
  errorResponse,
  mergeCounts,
} from '@taxi-stream/domain';
import type { StageResponse, TripEnrichmentPort } from '@taxi-stream/domain';
import {
  LocationReverseGeocoder,
  SqsDeadLetterQueue,
  SqsWorkQueue,
  getLocationClient,
  getSqsClient,
} from '@taxi-stream/adapters';
import type { Env } from '@taxi-stream/adapters';
import { loadEnrichmentConfig } from './config.js';
import type { EnrichmentConfig } from './config.js';
import { readKinesisEvent } from './kinesis-event.js';
import { TripEnrichmentService } from './enrichment.service.js';

export type EnrichmentFactory = (config: EnrichmentConfig) => TripEnrichmentPort;

export function buildEnrichmentService(config: EnrichmentConfig): TripEnrichmentPort {
  const sqs = getSqsClient(config.region);
  return new TripEnrichmentService({
    geocoder: new LocationReverseGeocoder(config.placeIndexName, getLocationClient(config.region)),
    queue: new SqsWorkQueue(config.queueUrl, sqs),
    deadLetters: config.deadLetterQueueUrl
      ? new SqsDeadLetterQueue(config.deadLetterQueueUrl, sqs)
      : undefined,
  });
}

export function createEnrichmentHandler(
  factory: EnrichmentFactory = buildEnrichmentService,
  env: Env = process.env,
): (event: unknown) => Promise<StageResponse> {
  return async (event) => {
    let config: EnrichmentConfig;
    try {
      config = loadEnrichmentConfig(env);
    } catch (err) {
      if (err instanceof ConfigurationError) {
        console.error(`[enrichment] ${err.message}`);
        return errorResponse(500, err.message);
      }
      throw err;
    }

    const batch = readKinesisEvent(event);
    if (!batch) {
      console.error('[enrichment] event has no Records array');
      return errorResponse(400, 'event has no Records array');
    }
    if (batch.rejected > 0) {
      console.error(`[enrichment] ${batch.rejected} records without kinesis data`);
    }

    const counts = mergeCounts(await factory(config).enrichBatch(batch.messages), {
      processed: 0,
      failed: batch.rejected,
      total: batch.rejected,
    });
    console.log(
      `[enrichment] processed=${counts.processed} failed=${counts.failed} total=${counts.total}`,
    );
    return batchResponse(
      `Successfully processed ${counts.processed} of ${counts.total} records and sent to SQS.`,
      counts,
    );
  };
}

/** Stream-trigger entry point. */
export const handler = createEnrichmentHandler();
