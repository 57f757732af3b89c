import { toDecimal, toInteger, toText } from '@taxi-stream/domain';
import type { FinalizedTrip, TripStoreItem } from '@taxi-stream/domain';

/** The primary-store row: a closed field set, numerics as exact decimals. */
export function toStoreItem(trip: FinalizedTrip): TripStoreItem {
  const p = trip.payload;
  return {
    trip_id: trip.tripId,
    taxi_id: trip.taxiId,
    pickup_datetime: trip.pickupDatetime,
    pickup_lat: toDecimal(trip.pickupLat),
    pickup_long: toDecimal(trip.pickupLong),
    drop_lat: toDecimal(trip.dropLat),
    drop_long: toDecimal(trip.dropLong),
    distance_km: toDecimal(trip.distanceKm),
    zone_name: toText(p['zone_name']),
    fare_amount: trip.fareAmount,
    passenger_count: toInteger(p['passenger_count']),
    extra_charges: toDecimal(p['extra_charges']),
    tip_amount: toDecimal(p['tip_amount']),
    tolls_amount: toDecimal(p['tolls_amount']),
    total_amount: trip.totalAmount,
    payment_type: toText(p['payment_type']),
  };
}
