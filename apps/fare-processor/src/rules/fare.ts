import type { Decimal } from 'decimal.js';
import { roundMoney, toFloat } from '@taxi-stream/domain';
import type { FinalizedTrip, TripPayload, ValidatedTrip } from '@taxi-stream/domain';
import { applyTripDefaults } from './defaults.js';

export const BASE_FARE = 50.0;
export const RATE_PER_KM = 18.5;
export const AIRPORT_SURCHARGE = 100.0;

/**
 * fare = 50 + 18.5 * distance_km, plus 100 when the zone mentions "Airport",
 * rounded to 2 places. A non-numeric distance counts as 0 km.
 *
 * The sum is taken in float arithmetic and rounded from there, so fares
 * agree to the cent with the amounts already billed by the float pipeline.
 */
export function calculateFare(distanceKm: unknown, zoneName: unknown): Decimal {
  let fare = BASE_FARE + toFloat(distanceKm) * RATE_PER_KM;
  if (typeof zoneName === 'string' && zoneName.includes('Airport')) {
    fare += AIRPORT_SURCHARGE;
  }
  return roundMoney(fare);
}

/** Recomputed here, never trusted from upstream; unparsable surcharges count as 0. */
export function computeTotal(fare: Decimal, payload: TripPayload): Decimal {
  return roundMoney(
    fare.toNumber() +
      toFloat(payload['extra_charges']) +
      toFloat(payload['tip_amount']) +
      toFloat(payload['tolls_amount']),
  );
}

/** Fare, then defaults, then total; the result payload carries all three. */
export function finalizeTrip(trip: ValidatedTrip): FinalizedTrip {
  const fareAmount = calculateFare(trip.distanceKm, trip.payload['zone_name']);
  const payload = applyTripDefaults({ ...trip.payload, fare_amount: fareAmount.toNumber() });
  const totalAmount = computeTotal(fareAmount, payload);
  payload['total_amount'] = totalAmount.toNumber();
  return { ...trip, fareAmount, totalAmount, payload };
}
