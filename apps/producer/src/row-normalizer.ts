import { parseNumber, toFloat, toInteger } from '@taxi-stream/domain';
import type { SourceRow, TripPayload } from '@taxi-stream/domain';

const GEOMETRY_FIELDS = [
  'latitude',
  'longitude',
  'pickup_lat',
  'pickup_long',
  'drop_lat',
  'drop_long',
  'distance_km',
] as const;

// Pickup columns and the legacy columns older exports carry instead.
const PICKUP_ALIASES = [
  ['pickup_lat', 'latitude'],
  ['pickup_long', 'longitude'],
] as const;

const MONEY_FIELDS = ['fare_amount', 'tip_amount', 'tolls_amount', 'total_amount'] as const;

export type RowAdmission =
  | { readonly admitted: true; readonly tripId: string; readonly record: TripPayload }
  | { readonly admitted: false; readonly tripId: string; readonly reason: string };

export function stripQuotes(value: string): string {
  return value.replace(/^"+|"+$/g, '');
}

/**
 * Admit a CSV row and coerce its typed columns. Columns the pipeline does
 * not type (ids, timestamps, payment_type, ...) pass through as text.
 */
export function normalizeRow(row: SourceRow): RowAdmission {
  const tripId = row['trip_id'] ?? '';
  const label = tripId.trim() || 'N/A';

  if ((row['pickup_datetime'] ?? '').trim() === '') {
    return { admitted: false, tripId: label, reason: 'missing pickup_datetime' };
  }
  if (tripId.trim() === '') {
    return { admitted: false, tripId: label, reason: 'missing trip_id' };
  }

  const record: TripPayload = { ...row };
  for (const field of GEOMETRY_FIELDS) {
    record[field] = toFloat(row[field]);
  }
  for (const [pickup, legacy] of PICKUP_ALIASES) {
    const fromPickup = parseNumber(row[pickup]);
    const fromLegacy = parseNumber(row[legacy]);
    record[pickup] = fromPickup ?? fromLegacy ?? 0;
    record[legacy] = fromLegacy ?? fromPickup ?? 0;
  }
  record['passenger_count'] = toInteger(row['passenger_count']);
  for (const field of MONEY_FIELDS) {
    record[field] = toFloat(row[field]);
  }
  // older exports name the column `extra`
  record['extra_charges'] = toFloat(row['extra_charges'] ?? row['extra']);
  record['zone_name'] = stripQuotes(row['zone_name'] ?? '');

  return { admitted: true, tripId, record };
}
