#!/usr/bin/env node
import 'dotenv/config';
import { ConfigurationError } from '@taxi-stream/domain';
import {
  CsvTripSource,
  KinesisStreamPublisher,
  getKinesisClient,
  resetAwsClients,
} from '@taxi-stream/adapters';
import { loadProducerConfig } from './config.js';
import { TripProducer } from './producer.service.js';

/**
 * Producer CLI.
 *
 * Env vars:
 *   CSV_FILE_PATH: trips CSV to read (default: taxi_trips_1000.csv)
 *   KINESIS_STREAM_NAME: ingress stream (default: taxi-trip-stream)
 *   BATCH_SIZE: records per bulk publish (default: 100)
 *   AWS_REGION: stream region (default: ap-south-1)
 *   PRODUCER_PAUSE_MS: pause after each full batch (default: 100)
 */
async function main(): Promise<number> {
  const config = loadProducerConfig();
  const producer = new TripProducer({
    source: new CsvTripSource(),
    publisher: new KinesisStreamPublisher(getKinesisClient(config.region)),
    pauseMs: config.pauseMs,
  });
  try {
    const summary = await producer.sendAll(config.csvFilePath, config.streamName, config.batchSize);
    return summary.status === 'completed' ? 0 : 1;
  } finally {
    resetAwsClients();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    if (err instanceof ConfigurationError) {
      console.error(`[producer] configuration error: ${err.message}`);
    } else {
      console.error('[producer] fatal error', err);
    }
    process.exit(1);
  });
