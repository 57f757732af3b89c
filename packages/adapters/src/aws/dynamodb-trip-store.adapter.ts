import { PutItemCommand } from '@aws-sdk/client-dynamodb';
import type { AttributeValue, PutItemCommandOutput } from '@aws-sdk/client-dynamodb';
import type { Decimal } from 'decimal.js';
import type { TripStorePort, TripStoreItem } from '@taxi-stream/domain';
import { getDynamoDbClient } from './clients.js';

export interface DynamoDbSender {
  send(command: PutItemCommand): Promise<PutItemCommandOutput>;
}

// DynamoDB numbers travel as decimal strings; toFixed() never switches to exponent notation.
function num(value: Decimal): AttributeValue {
  return { N: value.toFixed() };
}

export function marshalTripItem(item: TripStoreItem): Record<string, AttributeValue> {
  return {
    trip_id: { S: item.trip_id },
    taxi_id: { S: item.taxi_id },
    pickup_datetime: { S: item.pickup_datetime },
    pickup_lat: num(item.pickup_lat),
    pickup_long: num(item.pickup_long),
    drop_lat: num(item.drop_lat),
    drop_long: num(item.drop_long),
    distance_km: num(item.distance_km),
    zone_name: { S: item.zone_name },
    fare_amount: num(item.fare_amount),
    passenger_count: { N: String(item.passenger_count) },
    extra_charges: num(item.extra_charges),
    tip_amount: num(item.tip_amount),
    tolls_amount: num(item.tolls_amount),
    total_amount: num(item.total_amount),
    payment_type: { S: item.payment_type },
  };
}

export class DynamoDbTripStore implements TripStorePort {
  constructor(
    private readonly tableName: string,
    private readonly client: DynamoDbSender = getDynamoDbClient(),
  ) {}

  async putTrip(item: TripStoreItem): Promise<void> {
    await this.client.send(
      new PutItemCommand({ TableName: this.tableName, Item: marshalTripItem(item) }),
    );
  }
}
