import {
  NUMERIC_TRIP_FIELDS,
  REQUIRED_TRIP_FIELDS,
  parseNumber,
  toText,
  tripIdOf,
} from '@taxi-stream/domain';
import type { RequiredTripField, TripPayload, ValidatedTrip } from '@taxi-stream/domain';

export type TripValidation =
  | { readonly valid: true; readonly trip: ValidatedTrip }
  | { readonly valid: false; readonly reason: string };

function isMissing(payload: TripPayload, field: RequiredTripField): boolean {
  if (field === 'trip_id') return tripIdOf(payload) === undefined;
  const value = payload[field];
  return value === undefined || value === null;
}

/**
 * Gate before any side effect: every required field present, then every
 * geometry/distance field numeric. The first numeric failure wins.
 */
export function validateTrip(payload: TripPayload): TripValidation {
  const missing = REQUIRED_TRIP_FIELDS.filter((field) => isMissing(payload, field));
  if (missing.length > 0) {
    return { valid: false, reason: `Missing required fields: ${missing.join(', ')}` };
  }

  const numbers: Partial<Record<(typeof NUMERIC_TRIP_FIELDS)[number], number>> = {};
  for (const field of NUMERIC_TRIP_FIELDS) {
    const value = parseNumber(payload[field]);
    if (value === undefined) {
      return {
        valid: false,
        reason: `Invalid numeric value for ${field}: ${toText(payload[field])}`,
      };
    }
    numbers[field] = value;
  }

  return {
    valid: true,
    trip: {
      tripId: tripIdOf(payload) ?? '',
      taxiId: toText(payload['taxi_id']),
      pickupDatetime: toText(payload['pickup_datetime']),
      pickupLat: numbers.pickup_lat ?? 0,
      pickupLong: numbers.pickup_long ?? 0,
      dropLat: numbers.drop_lat ?? 0,
      dropLong: numbers.drop_long ?? 0,
      distanceKm: numbers.distance_km ?? 0,
      payload,
    },
  };
}
