import type { Decimal } from 'decimal.js';

/**
 * A trip as it travels between stages: the decoded JSON object, keyed by the
 * source CSV's column names. Stages read what they need and pass every other
 * field through untouched.
 */
export type TripPayload = Record<string, unknown>;

export const UNKNOWN_ZONE = 'Unknown';
export const DEFAULT_PAYMENT_TYPE = 'CASH';

export const REQUIRED_TRIP_FIELDS = [
  'trip_id',
  'taxi_id',
  'pickup_datetime',
  'pickup_lat',
  'pickup_long',
  'drop_lat',
  'drop_long',
  'distance_km',
] as const;

export const NUMERIC_TRIP_FIELDS = [
  'pickup_lat',
  'pickup_long',
  'drop_lat',
  'drop_long',
  'distance_km',
] as const;

export type RequiredTripField = (typeof REQUIRED_TRIP_FIELDS)[number];

/** A payload that passed the fare stage's admission checks. */
export interface ValidatedTrip {
  readonly tripId: string;
  readonly taxiId: string;
  readonly pickupDatetime: string;
  readonly pickupLat: number;
  readonly pickupLong: number;
  readonly dropLat: number;
  readonly dropLong: number;
  readonly distanceKm: number;
  readonly payload: TripPayload;
}

/**
 * A validated trip after fare computation and defaulting.
 * `payload` carries `fare_amount`, `total_amount` and the defaulted billing fields.
 */
export interface FinalizedTrip extends ValidatedTrip {
  readonly fareAmount: Decimal;
  readonly totalAmount: Decimal;
}

/** The primary-store row. Every numeric column except `passenger_count` is an exact decimal. */
export interface TripStoreItem {
  readonly trip_id: string;
  readonly taxi_id: string;
  readonly pickup_datetime: string;
  readonly pickup_lat: Decimal;
  readonly pickup_long: Decimal;
  readonly drop_lat: Decimal;
  readonly drop_long: Decimal;
  readonly distance_km: Decimal;
  readonly zone_name: string;
  readonly fare_amount: Decimal;
  readonly passenger_count: number;
  readonly extra_charges: Decimal;
  readonly tip_amount: Decimal;
  readonly tolls_amount: Decimal;
  readonly total_amount: Decimal;
  readonly payment_type: string;
}

/** One analytics-sink document: the finalized payload plus warehouse column aliases. */
export interface AnalyticsTripDocument {
  readonly [field: string]: unknown;
  readonly trip_id: string;
  readonly fare_amount: number;
  readonly total_amount: number;
  readonly dropoff_datetime: unknown;
  readonly pickup_latitude: unknown;
  readonly pickup_longitude: unknown;
  readonly dropoff_latitude: unknown;
  readonly dropoff_longitude: unknown;
}

/** The trip id as text, or undefined when absent, blank or not a scalar. */
export function tripIdOf(payload: TripPayload): string | undefined {
  const value = payload['trip_id'];
  if (typeof value === 'string') return value.trim() === '' ? undefined : value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}
