import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { FirehoseClient } from '@aws-sdk/client-firehose';
import { KinesisClient } from '@aws-sdk/client-kinesis';
import { LocationClient } from '@aws-sdk/client-location';
import { SQSClient } from '@aws-sdk/client-sqs';

// ─────────────────────────────────────────────────────────────────────────────
// Process-scoped AWS clients, created on first use, reused by every
// invocation a warm runtime serves. The region of the first call wins;
// without one the SDK's default provider chain resolves it.
// ─────────────────────────────────────────────────────────────────────────────

let _kinesis: KinesisClient | null = null;
let _location: LocationClient | null = null;
let _sqs: SQSClient | null = null;
let _dynamo: DynamoDBClient | null = null;
let _firehose: FirehoseClient | null = null;

function regionConfig(region?: string): { region?: string } {
  return region ? { region } : {};
}

export function getKinesisClient(region?: string): KinesisClient {
  if (!_kinesis) _kinesis = new KinesisClient(regionConfig(region));
  return _kinesis;
}

export function getLocationClient(region?: string): LocationClient {
  if (!_location) _location = new LocationClient(regionConfig(region));
  return _location;
}

export function getSqsClient(region?: string): SQSClient {
  if (!_sqs) _sqs = new SQSClient(regionConfig(region));
  return _sqs;
}

export function getDynamoDbClient(region?: string): DynamoDBClient {
  if (!_dynamo) _dynamo = new DynamoDBClient(regionConfig(region));
  return _dynamo;
}

export function getFirehoseClient(region?: string): FirehoseClient {
  if (!_firehose) _firehose = new FirehoseClient(regionConfig(region));
  return _firehose;
}

/** Tear down every cached client; the next getter call builds a fresh one. */
export function resetAwsClients(): void {
  for (const client of [_kinesis, _location, _sqs, _dynamo, _firehose]) {
    client?.destroy();
  }
  _kinesis = null;
  _location = null;
  _sqs = null;
  _dynamo = null;
  _firehose = null;
}
