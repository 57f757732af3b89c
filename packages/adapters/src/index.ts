// ─── AWS Clients ──────────────────────────────────────────────────────────────
export {
  getKinesisClient,
  getLocationClient,
  getSqsClient,
  getDynamoDbClient,
  getFirehoseClient,
  resetAwsClients,
} from './aws/clients.js';

// ─── AWS Adapters ─────────────────────────────────────────────────────────────
export { KinesisStreamPublisher } from './aws/kinesis-stream-publisher.adapter.js';
export type { KinesisSender } from './aws/kinesis-stream-publisher.adapter.js';
export { LocationReverseGeocoder } from './aws/location-reverse-geocoder.adapter.js';
export type { LocationSender } from './aws/location-reverse-geocoder.adapter.js';
export { SqsWorkQueue, SqsDeadLetterQueue } from './aws/sqs-queue.adapter.js';
export type { SqsSender } from './aws/sqs-queue.adapter.js';
export { DynamoDbTripStore, marshalTripItem } from './aws/dynamodb-trip-store.adapter.js';
export type { DynamoDbSender } from './aws/dynamodb-trip-store.adapter.js';
export { FirehoseAnalyticsSink } from './aws/firehose-analytics-sink.adapter.js';
export type { FirehoseSender } from './aws/firehose-analytics-sink.adapter.js';

// ─── CSV Source ───────────────────────────────────────────────────────────────
export { CsvTripSource, parseTripCsv } from './csv/csv-trip-source.js';

// ─── PostgreSQL (warehouse) ───────────────────────────────────────────────────
export { getPool, closePool, withTransaction } from './postgres/pool.js';
export type { DbPool, DbClient } from './postgres/pool.js';
export {
  splitSqlStatements,
  applyStatements,
  applyWarehouseSchema,
} from './postgres/warehouse-schema.js';
export type { SqlExecutor } from './postgres/warehouse-schema.js';

// ─── Configuration ────────────────────────────────────────────────────────────
export { loadEnv } from './config/env.js';
export type { Env } from './config/env.js';
