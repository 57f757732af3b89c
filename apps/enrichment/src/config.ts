import { z } from 'zod';
import { loadEnv } from '@taxi-stream/adapters';
import type { Env } from '@taxi-stream/adapters';

const nonBlank = z.string().trim().min(1, 'must not be blank');

const enrichmentEnvSchema = z.object({
  PLACE_INDEX_NAME: nonBlank,
  SQS_QUEUE_URL: nonBlank,
  ENRICHMENT_DLQ_URL: nonBlank.optional(),
  AWS_REGION: nonBlank.optional(),
});

export interface EnrichmentConfig {
  placeIndexName: string;
  queueUrl: string;
  deadLetterQueueUrl?: string;
  region?: string;
}

export function loadEnrichmentConfig(env: Env = process.env): EnrichmentConfig {
  const parsed = loadEnv(enrichmentEnvSchema, env);
  return {
    placeIndexName: parsed.PLACE_INDEX_NAME,
    queueUrl: parsed.SQS_QUEUE_URL,
    deadLetterQueueUrl: parsed.ENRICHMENT_DLQ_URL,
    region: parsed.AWS_REGION,
  };
}
