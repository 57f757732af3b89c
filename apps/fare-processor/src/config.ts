import { z } from 'zod';
import { loadEnv } from '@taxi-stream/adapters';
import type { Env } from '@taxi-stream/adapters';

const nonBlank = z.string().trim().min(1, 'must not be blank');

const fareProcessorEnvSchema = z.object({
  DYNAMODB_TABLE_NAME: nonBlank,
  FIREHOSE_STREAM_NAME: nonBlank,
  AWS_REGION: nonBlank.optional(),
});

export interface FareProcessorConfig {
  tableName: string;
  deliveryStreamName: string;
  region?: string;
}

export function loadFareProcessorConfig(env: Env = process.env): FareProcessorConfig {
  const parsed = loadEnv(fareProcessorEnvSchema, env);
  return {
    tableName: parsed.DYNAMODB_TABLE_NAME,
    deliveryStreamName: parsed.FIREHOSE_STREAM_NAME,
    region: parsed.AWS_REGION,
  };
}
