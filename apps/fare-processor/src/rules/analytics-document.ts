import type { AnalyticsTripDocument, FinalizedTrip, TripPayload } from '@taxi-stream/domain';

// Warehouse column name -> canonical payload field it mirrors.
const COORDINATE_ALIASES: Readonly<Record<string, string>> = {
  pickup_latitude: 'pickup_lat',
  pickup_longitude: 'pickup_long',
  dropoff_latitude: 'drop_lat',
  dropoff_longitude: 'drop_long',
};

function withAlias(doc: TripPayload, key: string, value: unknown): void {
  if (!Object.hasOwn(doc, key)) doc[key] = value;
}

export function toAnalyticsDocument(trip: FinalizedTrip): AnalyticsTripDocument {
  const doc: TripPayload = { ...trip.payload };
  withAlias(doc, 'dropoff_datetime', null);
  for (const [alias, source] of Object.entries(COORDINATE_ALIASES)) {
    withAlias(doc, alias, trip.payload[source] ?? null);
  }
  return {
    ...doc,
    trip_id: trip.tripId,
    fare_amount: trip.fareAmount.toNumber(),
    total_amount: trip.totalAmount.toNumber(),
    dropoff_datetime: doc['dropoff_datetime'],
    pickup_latitude: doc['pickup_latitude'],
    pickup_longitude: doc['pickup_longitude'],
    dropoff_latitude: doc['dropoff_latitude'],
    dropoff_longitude: doc['dropoff_longitude'],
  };
}

/** One newline-terminated JSON document per trip. */
export function serializeAnalyticsDocument(doc: AnalyticsTripDocument): string {
  return `${JSON.stringify(doc)}\n`;
}
