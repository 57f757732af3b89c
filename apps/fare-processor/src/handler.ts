import {
  ConfigurationError,
  batchResponse,
  errorResponse,
  mergeCounts,
} from '@taxi-stream/domain';
import type { FareProcessingPort, StageResponse } from '@taxi-stream/domain';
import {
  DynamoDbTripStore,
  FirehoseAnalyticsSink,
  getDynamoDbClient,
  getFirehoseClient,
} from '@taxi-stream/adapters';
import type { Env } from '@taxi-stream/adapters';
import { loadFareProcessorConfig } from './config.js';
import type { FareProcessorConfig } from './config.js';
import { readSqsEvent } from './sqs-event.js';
import { FareProcessingService } from './fare-processing.service.js';

export type FareProcessingFactory = (config: FareProcessorConfig) => FareProcessingPort;

export function buildFareProcessingService(config: FareProcessorConfig): FareProcessingPort {
  return new FareProcessingService({
    store: new DynamoDbTripStore(config.tableName, getDynamoDbClient(config.region)),
    sink: new FirehoseAnalyticsSink(config.deliveryStreamName, getFirehoseClient(config.region)),
  });
}

export function createFareHandler(
  factory: FareProcessingFactory = buildFareProcessingService,
  env: Env = process.env,
): (event: unknown) => Promise<StageResponse> {
  return async (event) => {
    let config: FareProcessorConfig;
    try {
      config = loadFareProcessorConfig(env);
    } catch (err) {
      if (err instanceof ConfigurationError) {
        console.error(`[fare] ${err.message}`);
        return errorResponse(500, err.message);
      }
      throw err;
    }

    const batch = readSqsEvent(event);
    if (!batch) {
      console.error('[fare] event has no Records array');
      return errorResponse(400, 'event has no Records array');
    }
    if (batch.rejected > 0) {
      console.error(`[fare] ${batch.rejected} records without a message body`);
    }

    const counts = mergeCounts(await factory(config).processBatch(batch.messages), {
      processed: 0,
      failed: batch.rejected,
      total: batch.rejected,
    });
    return batchResponse(`Successfully processed ${counts.processed} records from SQS`, counts);
  };
}

/** Queue-trigger entry point. */
export const handler = createFareHandler();
