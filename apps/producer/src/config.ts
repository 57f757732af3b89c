import { z } from 'zod';
import { loadEnv } from '@taxi-stream/adapters';
import type { Env } from '@taxi-stream/adapters';
import { DEFAULT_BATCH_SIZE } from '@taxi-stream/domain';

const nonBlank = z.string().trim().min(1, 'must not be blank');

const producerEnvSchema = z.object({
  CSV_FILE_PATH: nonBlank.default('taxi_trips_1000.csv'),
  KINESIS_STREAM_NAME: nonBlank.default('taxi-trip-stream'),
  BATCH_SIZE: z.coerce.number().int().positive().default(DEFAULT_BATCH_SIZE),
  AWS_REGION: nonBlank.default('ap-south-1'),
  PRODUCER_PAUSE_MS: z.coerce.number().int().nonnegative().default(100),
});

export interface ProducerConfig {
  csvFilePath: string;
  streamName: string;
  batchSize: number;
  region: string;
  pauseMs: number;
}

export function loadProducerConfig(env: Env = process.env): ProducerConfig {
  const parsed = loadEnv(producerEnvSchema, env);
  return {
    csvFilePath: parsed.CSV_FILE_PATH,
    streamName: parsed.KINESIS_STREAM_NAME,
    batchSize: parsed.BATCH_SIZE,
    region: parsed.AWS_REGION,
    pauseMs: parsed.PRODUCER_PAUSE_MS,
  };
}
